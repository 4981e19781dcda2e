// seqbench results
// Per-operation measurement with its derived verdict

/**
 * Which variant won a measurement.
 */
export type Faster = "A" | "B" | "tie";

/**
 * Rule deciding when two durations are too close to call.
 *
 * - `absolute`: tie when `|a - b| < thresholdNs`.
 * - `relative`: tie when `|a - b| < ratio * max(a, b)`.
 *
 * A zero difference is a tie under either rule.
 */
export type TolerancePolicy =
  | { kind: "absolute"; thresholdNs: number }
  | { kind: "relative"; ratio: number };

/** Only exactly equal integer durations tie. */
export const defaultTolerance: TolerancePolicy = { kind: "absolute", thresholdNs: 1 };

/**
 * Decide the faster variant for a pair of durations.
 */
export function compareDurations(
  durationA: number,
  durationB: number,
  tolerance: TolerancePolicy = defaultTolerance
): Faster {
  const diff = Math.abs(durationA - durationB);
  if (diff === 0 || withinTolerance(diff, durationA, durationB, tolerance)) {
    return "tie";
  }
  return durationA < durationB ? "A" : "B";
}

/**
 * Ratio of the slower duration to the faster one, or 0 when either is zero.
 */
export function speedRatioOf(durationA: number, durationB: number): number {
  if (durationA === 0 || durationB === 0) return 0;
  return Math.max(durationA, durationB) / Math.min(durationA, durationB);
}

function withinTolerance(
  diff: number,
  durationA: number,
  durationB: number,
  tolerance: TolerancePolicy
): boolean {
  switch (tolerance.kind) {
    case "absolute":
      return diff < tolerance.thresholdNs;
    case "relative":
      return diff < tolerance.ratio * Math.max(durationA, durationB);
  }
}

/**
 * One measured operation: the elapsed nanoseconds for both variants and the
 * verdict derived from them. Instances are frozen.
 */
export class OperationResult {
  readonly faster: Faster;
  readonly speedRatio: number;

  constructor(
    readonly name: string,
    readonly operationCount: number,
    readonly durationA: number,
    readonly durationB: number,
    tolerance: TolerancePolicy = defaultTolerance
  ) {
    this.faster = compareDurations(durationA, durationB, tolerance);
    this.speedRatio = speedRatioOf(durationA, durationB);
    Object.freeze(this);
  }
}

/**
 * Results of one runner invocation, in battery order.
 */
export type ResultSet = readonly OperationResult[];
