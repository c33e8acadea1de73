#!/usr/bin/env -S npx tsx
/**
 * Print draws from a pcg32 generator.
 *
 * Usage:
 *   tsx scripts/sample.ts [seed] [stream] [count]
 *
 * Seed and stream accept decimal or 0x-prefixed hex. Without a seed, the
 * generator seeds itself from the high-resolution timer.
 */
import { PcgRandom, createDrawLog } from "../src"

function parseSeed(arg: string | undefined, name: string): bigint | undefined {
	if (arg === undefined) return undefined
	try {
		return BigInt(arg)
	} catch {
		console.error(`Invalid ${name}: ${arg}`)
		process.exit(1)
	}
}

const seed = parseSeed(process.argv[2], "seed")
const stream = parseSeed(process.argv[3], "stream")
const count = Number(process.argv[4] ?? 8)
if (!Number.isInteger(count) || count < 0) {
	console.error(`Invalid count: ${process.argv[4]}`)
	process.exit(1)
}

const log = createDrawLog()
const rng = new PcgRandom({ seed, stream, log })

console.log(`seed:      ${rng.engine.state}`)
console.log(`increment: ${rng.engine.increment}`)

console.log("\n=== nextUint32 ===")
for (let i = 0; i < count; i++) {
	console.log(`  ${rng.nextUint32()}`)
}

console.log("\n=== sample ===")
for (let i = 0; i < count; i++) {
	console.log(`  ${rng.sample()}`)
}

const rejected = log.getMessages().filter((m) => m.type === "reject").length
console.log(`\n  Raw draws: ${rng.engine.draws} (${rejected} rejected)`)
console.log(`  Final state: ${rng.engine.state}`)
console.log("\nDone.")
