// seqbench errors
// Error types raised by the runner and the configuration loader

/**
 * BenchmarkError is the base class for all errors thrown by seqbench.
 */
export class BenchmarkError extends Error {
  override name = "BenchmarkError";
}

/**
 * InvalidOperationCountError is thrown when a run is requested with an
 * operation count that is not a positive integer.
 */
export class InvalidOperationCountError extends BenchmarkError {
  override name = "InvalidOperationCountError";

  constructor(readonly operationCount: number) {
    super(`operation count must be a positive integer, got ${operationCount}`);
  }
}

/**
 * ConfigError is thrown when an environment variable cannot be parsed.
 */
export class ConfigError extends BenchmarkError {
  override name = "ConfigError";

  constructor(
    readonly variable: string,
    readonly value: string,
    reason: string
  ) {
    super(`invalid ${variable}=${JSON.stringify(value)}: ${reason}`);
  }
}
