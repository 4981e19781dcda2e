import type { OperationResult, ResultSet } from "../result";
import type { VariantLabels } from "../runner";

/**
 * Unit used when printing durations.
 */
export type DurationUnit = "ns" | "ms";

/**
 * Win counts over a result set.
 */
export type Tally = {
  aWins: number;
  bWins: number;
  ties: number;
};

/**
 * Variant to prefer, or `depends` when neither wins more often.
 */
export type Recommendation = "A" | "B" | "depends";

/**
 * Decimal places for millisecond durations and speed ratios.
 */
export type Precision = {
  ms: number;
  ratio: number;
};

export const defaultPrecision: Precision = { ms: 3, ratio: 1 };

const NS_PER_MS = 1_000_000;

/**
 * Format integer nanoseconds in the requested unit. Nanoseconds print as
 * integers; milliseconds keep `precision.ms` decimals.
 */
export function formatDuration(
  durationNs: number,
  unit: DurationUnit,
  precision: Precision = defaultPrecision
): string {
  if (unit === "ms") {
    return (durationNs / NS_PER_MS).toFixed(precision.ms);
  }
  return String(durationNs);
}

/**
 * Display name of the faster variant, or `tie`.
 */
export function fasterLabel(result: OperationResult, labels: VariantLabels): string {
  switch (result.faster) {
    case "A":
      return labels.a;
    case "B":
      return labels.b;
    case "tie":
      return "tie";
  }
}

/**
 * Table rows: name, iterations, duration A, duration B, ratio, faster.
 */
export function buildRows(
  results: ResultSet,
  unit: DurationUnit,
  labels: VariantLabels,
  precision: Precision = defaultPrecision
): string[][] {
  return results.map((result) => [
    result.name,
    String(result.operationCount),
    formatDuration(result.durationA, unit, precision),
    formatDuration(result.durationB, unit, precision),
    result.speedRatio.toFixed(precision.ratio),
    fasterLabel(result, labels),
  ]);
}

export function tally(results: ResultSet): Tally {
  const counts: Tally = { aWins: 0, bWins: 0, ties: 0 };
  for (const result of results) {
    if (result.faster === "A") {
      counts.aWins += 1;
    } else if (result.faster === "B") {
      counts.bWins += 1;
    } else {
      counts.ties += 1;
    }
  }
  return counts;
}

export function recommend(counts: Tally): Recommendation {
  if (counts.aWins > counts.bWins) return "A";
  if (counts.bWins > counts.aWins) return "B";
  return "depends";
}

/**
 * Lines of the detailed analysis for one result: both durations and a verdict
 * graded by the speed ratio.
 */
export function describeResult(
  result: OperationResult,
  labels: VariantLabels,
  precision: Precision = defaultPrecision
): string[] {
  const line = (label: string, durationNs: number): string =>
    `  ${label}: ${formatDuration(durationNs, "ns")} ns (${formatDuration(durationNs, "ms", precision)} ms)`;
  const lines = [
    `${result.name}:`,
    line(labels.a, result.durationA),
    line(labels.b, result.durationB),
  ];
  const winner = fasterLabel(result, labels);
  const ratio = result.speedRatio.toFixed(precision.ratio);
  if (result.faster === "tie" || result.speedRatio <= 1.1) {
    lines.push("  negligible difference");
  } else if (result.speedRatio > 1.5) {
    lines.push(`  ${winner} is much faster (${ratio}x)`);
  } else {
    lines.push(`  ${winner} is slightly faster (${ratio}x)`);
  }
  return lines;
}
