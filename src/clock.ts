/**
 * Monotonic time source with nanosecond resolution.
 */
export interface Clock {
  now(): bigint;
}

/** Clock backed by `process.hrtime.bigint()`. */
export const monotonicClock: Clock = {
  now: () => process.hrtime.bigint(),
};

/**
 * Elapsed nanoseconds between two readings, as a plain number.
 */
export function elapsedNs(start: bigint, end: bigint): number {
  return Number(end - start);
}
