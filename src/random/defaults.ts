import type { GeneratorOptions, Seed, SeedClock } from "../../spec/random"
import { hrtimeClock } from "./clock"

/** LCG multiplier shared by every pcg32 stream. */
export const MULTIPLIER = 6364136223846793005n

export const DEFAULT_STREAM = 1442695040888963407n

export const UINT32_MAX = 0xffffffff

export const INVERSE_UINT32_MAX = 1.0 / UINT32_MAX

export const INT32_MIN = -0x80000000

export const INT32_MAX = 0x7fffffff

export interface ResolvedGeneratorOptions extends GeneratorOptions {
	readonly stream: Seed
	readonly clock: SeedClock
}

export const DEFAULT_OPTIONS: ResolvedGeneratorOptions = {
	stream: DEFAULT_STREAM,
	clock: hrtimeClock,
}

export function createDefaultOptions(overrides?: GeneratorOptions): ResolvedGeneratorOptions {
	return {
		...overrides,
		stream: overrides?.stream ?? DEFAULT_OPTIONS.stream,
		clock: overrides?.clock ?? DEFAULT_OPTIONS.clock,
	}
}
