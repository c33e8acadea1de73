/**
 * PCG32 engine (64-bit LCG state, XSH-RR 32-bit output).
 * Same (seed, stream) always produces the same sequence.
 *
 * Not cryptographically secure: the state can be recovered from outputs.
 */
import type { DrawLog, Seed } from "../../spec/random"
import { DEFAULT_STREAM, MULTIPLIER, UINT32_MAX } from "./defaults"
import { InvalidArgumentError } from "./errors"

export class Pcg32 {
	private s: bigint
	private readonly inc: bigint
	private drawCount = 0
	private readonly log: DrawLog | undefined

	constructor(seed: Seed, stream: Seed = DEFAULT_STREAM, log?: DrawLog) {
		this.s = toUint64(seed, "seed")
		// Odd increment gives the LCG its full 2^64 period
		this.inc = toUint64(stream, "stream") | 1n
		this.log = log
	}

	get state(): bigint {
		return this.s
	}

	get increment(): bigint {
		return this.inc
	}

	/** Number of raw draws taken so far. */
	get draws(): number {
		return this.drawCount
	}

	/** Returns a 32-bit unsigned integer. */
	nextUint32(): number {
		const old = this.s
		this.s = BigInt.asUintN(64, old * MULTIPLIER + this.inc)

		const xorShifted = Number(BigInt.asUintN(32, ((old >> 18n) ^ old) >> 27n))
		const rot = Number(old >> 59n)
		const result = ((xorShifted >>> rot) | (xorShifted << (-rot & 31))) >>> 0

		this.log?.draw(this.drawCount, result)
		this.drawCount++
		return result
	}

	/**
	 * Returns an integer in [0, max). Returns 0 without drawing when max is 0.
	 *
	 * Draws below `(2^32 - 1 - max) % max` are rejected so that the
	 * remaining range is an exact multiple of max (no modulo bias).
	 */
	nextBounded(max: number): number {
		if (!Number.isInteger(max) || max < 0 || max > UINT32_MAX) {
			throw new InvalidArgumentError("max", max, "must be an integer in [0, 4294967295]")
		}
		if (max === 0) {
			return 0
		}

		const threshold = (UINT32_MAX - max) % max
		for (;;) {
			const index = this.drawCount
			const r = this.nextUint32()
			if (r >= threshold) {
				return r % max
			}
			this.log?.reject(index, r, "bounded", max)
		}
	}
}

function toUint64(value: Seed, paramName: string): bigint {
	if (typeof value === "bigint") {
		return BigInt.asUintN(64, value)
	}
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new InvalidArgumentError(paramName, value, "must be a non-negative safe integer or a bigint")
	}
	return BigInt(value)
}
