export { Pcg32 } from "./pcg32"
export { PcgRandom, createPcgRandom } from "./random"
export {
	MULTIPLIER,
	DEFAULT_STREAM,
	UINT32_MAX,
	INVERSE_UINT32_MAX,
	INT32_MIN,
	INT32_MAX,
	DEFAULT_OPTIONS,
	createDefaultOptions,
} from "./defaults"
export type { ResolvedGeneratorOptions } from "./defaults"
export { InvalidArgumentError, NullBufferError } from "./errors"
export { createDrawLog } from "./draw-log"
export { hrtimeClock } from "./clock"
export type {
	Seed,
	SeedClock,
	GeneratorOptions,
	RandomSource,
	DrawLog,
	DrawLogMessage,
	DrawMessage,
	RejectMessage,
	RejectingOperation,
} from "../../spec/random"
