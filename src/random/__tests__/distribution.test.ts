import fc from "fast-check"
import { describe, expect, it } from "vitest"
import { INVERSE_UINT32_MAX, UINT32_MAX } from "../defaults"
import { Pcg32 } from "../pcg32"
import { PcgRandom } from "../random"

const LONG_RUN = 60_000

describe("determinism", () => {
	it(
		"matches draw for draw over a million draws",
		() => {
			const a = new Pcg32(0x853c49e6748fea9bn, 0xda3e39cb94b95bdbn)
			const b = new Pcg32(0x853c49e6748fea9bn, 0xda3e39cb94b95bdbn)
			let mismatches = 0
			for (let i = 0; i < 1_000_000; i++) {
				if (a.nextUint32() !== b.nextUint32()) mismatches++
			}
			expect(mismatches).toBe(0)
			expect(a.state).toBe(b.state)
		},
		LONG_RUN,
	)

	it("matches for arbitrary seed and stream", () => {
		fc.assert(
			fc.property(fc.bigUintN(64), fc.bigUintN(64), (seed, stream) => {
				const a = new PcgRandom(seed, stream)
				const b = new PcgRandom(seed, stream)
				const seqA = Array.from({ length: 32 }, () => a.nextUint32())
				const seqB = Array.from({ length: 32 }, () => b.nextUint32())
				expect(seqA).toEqual(seqB)
			}),
		)
	})
})

describe("nextBelow distribution", () => {
	it(
		"hits each face of a die within 2% of 1/6 over a million draws",
		() => {
			const rng = new PcgRandom(2024n, 54n)
			const counts = [0, 0, 0, 0, 0, 0]
			const n = 1_000_000
			for (let i = 0; i < n; i++) {
				const face = rng.nextBelow(6)
				counts[face] = (counts[face] ?? 0) + 1
			}

			const expected = n / 6
			for (const count of counts) {
				expect(Math.abs(count - expected) / expected).toBeLessThan(0.02)
			}

			const chiSquared = counts.reduce((sum, c) => sum + (c - expected) ** 2 / expected, 0)
			// 5 degrees of freedom, p = 0.001
			expect(chiSquared).toBeLessThan(20.515)
		},
		LONG_RUN,
	)

	it("stays in [0, max) for any positive max", () => {
		fc.assert(
			fc.property(fc.bigUintN(64), fc.integer({ min: 1, max: 0x7fffffff }), (seed, max) => {
				const rng = new PcgRandom(seed, 54n)
				for (let i = 0; i < 64; i++) {
					const v = rng.nextBelow(max)
					expect(v).toBeGreaterThanOrEqual(0)
					expect(v).toBeLessThan(max)
				}
			}),
		)
	})

	it("stays in [min, max) for any ordered int32 pair", () => {
		fc.assert(
			fc.property(
				fc.bigUintN(64),
				fc.integer({ min: -0x80000000, max: 0x7fffffff }),
				fc.integer({ min: -0x80000000, max: 0x7fffffff }),
				(seed, x, y) => {
					const min = Math.min(x, y)
					const max = Math.max(x, y)
					const v = new PcgRandom(seed, 54n).nextInRange(min, max)
					if (min === max) {
						expect(v).toBe(min)
					} else {
						expect(v).toBeGreaterThanOrEqual(min)
						expect(v).toBeLessThan(max)
					}
				},
			),
		)
	})
})

describe("sample bound", () => {
	it(
		"stays below 1 over ten million draws",
		() => {
			const rng = new PcgRandom(0x853c49e6748fea9bn, 54n)
			let max = 0
			for (let i = 0; i < 10_000_000; i++) {
				const v = rng.sample()
				if (v > max) max = v
			}
			expect(max).toBeLessThan(1)
			expect(max).toBeLessThan(UINT32_MAX * INVERSE_UINT32_MAX)
		},
		10 * LONG_RUN,
	)

	it("never returns the value of a rejected draw", () => {
		const rng = new PcgRandom(576458553405997536n, 54n)
		expect(rng.sample()).not.toBe(UINT32_MAX * INVERSE_UINT32_MAX)
	})
})
