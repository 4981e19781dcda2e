import type { ConsolaInstance } from "consola";
import { type Clock, elapsedNs, monotonicClock } from "../clock";
import { InvalidOperationCountError } from "../errors";
import { createLogger } from "../logger";
import { DEFAULT_SEED, type RandomSource, SeededRandom } from "../random";
import { OperationResult, type ResultSet, type TolerancePolicy, defaultTolerance } from "../result";
import { type SequenceVariant, arrayVariant, linkedVariant } from "../sequence";
import { type BenchmarkOperation, type OperationContext, defaultOperations } from "./operations";

/**
 * The two containers compared by a runner. `a` is reported as variant A.
 */
export type VariantPair = {
  a: SequenceVariant;
  b: SequenceVariant;
};

/**
 * Display labels of a variant pair.
 */
export type VariantLabels = {
  a: string;
  b: string;
};

/**
 * Options controlling a benchmark run.
 */
export interface BenchmarkRunnerOptions {
  /** Containers to compare. Defaults to array vs linked. */
  variants?: VariantPair;
  /** Seed for a fresh generator on every run. Ignored when `random` is set. */
  seed?: number;
  /** Generator shared by every run of this runner. */
  random?: RandomSource;
  /** Time source for the timed blocks. */
  clock?: Clock;
  /** Rule for declaring a tie. */
  tolerance?: TolerancePolicy;
  /** Blocks to execute, in order. */
  operations?: readonly BenchmarkOperation[];
  /** Receives debug-level progress. */
  logger?: ConsolaInstance;
}

/**
 * Benchmark runner comparing two sequence containers over a battery of timed
 * blocks.
 */
export class BenchmarkRunner {
  private readonly variants: VariantPair;
  private readonly seed: number;
  private readonly random: RandomSource | undefined;
  private readonly clock: Clock;
  private readonly tolerance: TolerancePolicy;
  private readonly operations: readonly BenchmarkOperation[];
  private readonly logger: ConsolaInstance;
  private sink = 0;

  constructor(options: BenchmarkRunnerOptions = {}) {
    this.variants = options.variants ?? { a: arrayVariant, b: linkedVariant };
    this.seed = options.seed ?? DEFAULT_SEED;
    this.random = options.random;
    this.clock = options.clock ?? monotonicClock;
    this.tolerance = options.tolerance ?? defaultTolerance;
    this.operations = options.operations ?? defaultOperations;
    this.logger = options.logger ?? createLogger();
  }

  get labels(): VariantLabels {
    return { a: this.variants.a.label, b: this.variants.b.label };
  }

  /**
   * Run every block once per variant and return one result per block.
   *
   * @throws InvalidOperationCountError when `operationCount` is not a positive
   * integer. Nothing is constructed or timed in that case.
   */
  run(operationCount: number): ResultSet {
    validateOperationCount(operationCount);

    const ctx: OperationContext = {
      random: this.random ?? new SeededRandom(this.seed),
    };
    this.logger.debug(
      `running ${this.operations.length} operations with count ${operationCount} ` +
        `(${this.variants.a.label} vs ${this.variants.b.label})`
    );

    const results = this.operations.map((operation) => {
      const iterations = operation.iterations(operationCount);
      const fixtureSize = operation.fixtureSize(operationCount);
      const durationA = this.measure(this.variants.a, operation, fixtureSize, iterations, ctx);
      const durationB = this.measure(this.variants.b, operation, fixtureSize, iterations, ctx);
      this.logger.debug(`${operation.name}: A=${durationA}ns B=${durationB}ns`);
      return new OperationResult(operation.name, iterations, durationA, durationB, this.tolerance);
    });
    this.logger.trace(`read checksum ${this.sink}`);
    return results;
  }

  /**
   * Run several operation counts in order. Every count is validated before the
   * first run starts.
   */
  runAll(operationCounts: readonly number[]): Map<number, ResultSet> {
    for (const operationCount of operationCounts) {
      validateOperationCount(operationCount);
    }
    const sets = new Map<number, ResultSet>();
    for (const operationCount of operationCounts) {
      sets.set(operationCount, this.run(operationCount));
    }
    return sets;
  }

  private measure(
    variant: SequenceVariant,
    operation: BenchmarkOperation,
    fixtureSize: number,
    iterations: number,
    ctx: OperationContext
  ): number {
    const sequence = variant.create();
    for (let i = 0; i < fixtureSize; i += 1) {
      sequence.append(i);
    }

    const start = this.clock.now();
    const value = operation.execute(sequence, iterations, ctx);
    const end = this.clock.now();

    this.sink ^= value;
    return elapsedNs(start, end);
  }
}

function validateOperationCount(operationCount: number): void {
  if (!Number.isSafeInteger(operationCount) || operationCount <= 0) {
    throw new InvalidOperationCountError(operationCount);
  }
}
