import type { DrawLog, GeneratorOptions, RandomSource, Seed } from "../../spec/random"
import { INT32_MAX, INT32_MIN, INVERSE_UINT32_MAX, UINT32_MAX, createDefaultOptions } from "./defaults"
import { InvalidArgumentError, NullBufferError } from "./errors"
import { Pcg32 } from "./pcg32"

const BYTE_WIDTH = 4

/**
 * Random number API over a {@link Pcg32} engine.
 *
 * Without a seed, the seed is read from a clock with finite resolution.
 * Generators created in close succession without an explicit seed may
 * therefore get identical seeds and produce identical sequences. Callers
 * that need independent unseeded generators must pass distinct `stream`
 * values or explicit seeds.
 *
 * Instances hold mutable state; share one between workers only behind
 * external synchronization, or give each worker its own stream.
 */
export class PcgRandom implements RandomSource {
	readonly engine: Pcg32
	private readonly log: DrawLog | undefined

	constructor()
	constructor(seed: Seed, stream?: Seed)
	constructor(options: GeneratorOptions)
	constructor(seedOrOptions?: Seed | GeneratorOptions, stream?: Seed) {
		const given: GeneratorOptions =
			typeof seedOrOptions === "object"
				? seedOrOptions
				: stream === undefined
					? { seed: seedOrOptions }
					: { seed: seedOrOptions, stream }
		const options = createDefaultOptions(given)
		const seed = options.seed ?? options.clock()
		this.engine = new Pcg32(seed, options.stream, options.log)
		this.log = options.log
	}

	nextUint32(): number {
		return this.engine.nextUint32()
	}

	/** Returns a non-negative int32 in [0, 2^31 - 1]. */
	next(): number {
		return this.engine.nextUint32() >>> 1
	}

	/** Returns an integer in [0, max); 0 when max is 0. */
	nextBelow(max: number): number {
		requireInt32("max", max)
		if (max < 0) {
			throw new InvalidArgumentError("max", max, "is less than 0")
		}
		return this.engine.nextBounded(max)
	}

	/** Returns an integer in [min, max); min when the two are equal. */
	nextInRange(min: number, max: number): number {
		requireInt32("min", min)
		requireInt32("max", max)
		if (min > max) {
			throw new InvalidArgumentError("min", min, `is greater than max (${max})`)
		}
		if (min === max) {
			return min
		}
		return this.engine.nextBounded(max - min) + min
	}

	/**
	 * Fills buffer with random bytes, least-significant byte of each draw
	 * first. The last group of one to four bytes takes one more draw and
	 * drops its unused high bytes.
	 */
	fillBytes(buffer: Uint8Array | null | undefined): Uint8Array {
		if (buffer === null || buffer === undefined) {
			throw new NullBufferError("buffer")
		}

		let i = 0
		for (; i < buffer.length - BYTE_WIDTH; i += BYTE_WIDTH) {
			let pack = this.engine.nextUint32()
			for (let b = 0; b < BYTE_WIDTH; b++, pack >>>= 8) {
				buffer[i + b] = pack & 0xff
			}
		}

		for (let pack = this.engine.nextUint32(); i < buffer.length; i++, pack >>>= 8) {
			buffer[i] = pack & 0xff
		}
		return buffer
	}

	/**
	 * Returns a float in [0, 1). A draw of 2^32 - 1 is redrawn, so the
	 * largest result is (2^32 - 2) / (2^32 - 1).
	 */
	sample(): number {
		for (;;) {
			const index = this.engine.draws
			const r = this.engine.nextUint32()
			if (r !== UINT32_MAX) {
				return r * INVERSE_UINT32_MAX
			}
			this.log?.reject(index, r, "sample")
		}
	}

	/** A drop-in replacement for `Math.random` drawing from this generator. */
	toMathRandom(): () => number {
		return () => this.sample()
	}
}

export function createPcgRandom(options: GeneratorOptions = {}): PcgRandom {
	return new PcgRandom(options)
}

function requireInt32(paramName: string, value: number): void {
	if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
		throw new InvalidArgumentError(paramName, value, "must be a 32-bit signed integer")
	}
}
