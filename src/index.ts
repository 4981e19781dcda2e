/**
 * seqbench: timing comparison of array-backed and linked sequence containers
 *
 * A runner executes a fixed battery of timed blocks (append, prepend,
 * middle-insert, random and sequential reads, and removals at the front, back
 * and middle) against two containers, and a reporter prints the results as
 * tables with a win tally and a recommendation.
 *
 * @packageDocumentation
 * @module seqbench
 *
 * @example
 * ```typescript
 * import { BenchmarkRunner, Reporter } from "seqbench";
 *
 * const runner = new BenchmarkRunner({ seed: 7 });
 * const results = runner.run(10_000);
 *
 * const reporter = new Reporter({ labels: runner.labels });
 * reporter.renderTable(results, "ms");
 * reporter.renderSummary(results);
 * ```
 */

export { VERSION } from "./version";

export { type Clock, elapsedNs, monotonicClock } from "./clock";
export { type SeqbenchConfig, defaultConfig, loadConfig } from "./config";
export { BenchmarkError, ConfigError, InvalidOperationCountError } from "./errors";
export { type LogLevelName, createLogger, isLogLevelName } from "./logger";
export { DEFAULT_SEED, type RandomSource, SeededRandom } from "./random";
export {
  type Faster,
  OperationResult,
  type ResultSet,
  type TolerancePolicy,
  compareDurations,
  defaultTolerance,
  speedRatioOf,
} from "./result";
export * from "./reporter";
export * from "./runner";
export * from "./sequence";
