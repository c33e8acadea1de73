/**
 * Draw log collector for generator diagnostics.
 *
 * Records every raw 32-bit draw and every draw thrown away by the
 * bias-removal and sampling rejection loops. Attached per generator
 * and entirely opt-in.
 */
import type { DrawLog, DrawLogMessage, RejectingOperation } from "../../spec/random"

/**
 * Create a new draw log collector.
 *
 * @param limit - keep only the most recent `limit` messages
 */
export function createDrawLog(limit = Number.POSITIVE_INFINITY): DrawLog {
	let messages: DrawLogMessage[] = []

	function push(message: DrawLogMessage): void {
		messages.push(message)
		if (messages.length > limit) {
			messages = messages.slice(messages.length - limit)
		}
	}

	return {
		draw(index: number, value: number) {
			push({ type: "draw", index, value })
		},

		reject(index: number, value: number, operation: RejectingOperation, bound?: number) {
			push(
				bound === undefined
					? { type: "reject", index, value, operation }
					: { type: "reject", index, value, operation, bound },
			)
		},

		getMessages(): readonly DrawLogMessage[] {
			return messages
		},

		clear() {
			messages = []
		},
	}
}
