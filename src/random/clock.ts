import type { SeedClock } from "../../spec/random"

/** Nanosecond tick count from the process high-resolution timer. */
export const hrtimeClock: SeedClock = () => process.hrtime.bigint()
