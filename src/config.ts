import { ConfigError } from "./errors";
import { type LogLevelName, isLogLevelName } from "./logger";
import { DEFAULT_SEED } from "./random";
import { type TolerancePolicy, defaultTolerance } from "./result";

/**
 * Settings that can come from the environment.
 */
export type SeqbenchConfig = {
  seed: number;
  tolerance: TolerancePolicy;
  logLevel: LogLevelName;
};

export const defaultConfig: SeqbenchConfig = {
  seed: DEFAULT_SEED,
  tolerance: defaultTolerance,
  logLevel: "info",
};

type ConfigEnv = {
  SEQBENCH_SEED?: string | undefined;
  SEQBENCH_TOLERANCE_NS?: string | undefined;
  SEQBENCH_TOLERANCE_RATIO?: string | undefined;
  SEQBENCH_LOG_LEVEL?: string | undefined;
};

/**
 * Read configuration from environment variables, falling back to defaults for
 * anything unset or empty. `SEQBENCH_TOLERANCE_RATIO` takes precedence over
 * `SEQBENCH_TOLERANCE_NS`.
 */
export function loadConfig(env: ConfigEnv = process.env): SeqbenchConfig {
  const config: SeqbenchConfig = { ...defaultConfig };

  const seed = nonEmpty(env.SEQBENCH_SEED);
  if (seed !== undefined) {
    const parsed = Number(seed);
    if (!Number.isSafeInteger(parsed)) {
      throw new ConfigError("SEQBENCH_SEED", seed, "expected an integer");
    }
    config.seed = parsed;
  }

  const thresholdNs = nonEmpty(env.SEQBENCH_TOLERANCE_NS);
  if (thresholdNs !== undefined) {
    const parsed = Number(thresholdNs);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new ConfigError("SEQBENCH_TOLERANCE_NS", thresholdNs, "expected a non-negative number");
    }
    config.tolerance = { kind: "absolute", thresholdNs: parsed };
  }

  const ratio = nonEmpty(env.SEQBENCH_TOLERANCE_RATIO);
  if (ratio !== undefined) {
    const parsed = Number(ratio);
    if (!Number.isFinite(parsed) || parsed < 0 || parsed >= 1) {
      throw new ConfigError("SEQBENCH_TOLERANCE_RATIO", ratio, "expected a number in [0, 1)");
    }
    config.tolerance = { kind: "relative", ratio: parsed };
  }

  const logLevel = nonEmpty(env.SEQBENCH_LOG_LEVEL);
  if (logLevel !== undefined) {
    if (!isLogLevelName(logLevel)) {
      throw new ConfigError("SEQBENCH_LOG_LEVEL", logLevel, "unknown log level");
    }
    config.logLevel = logLevel;
  }

  return config;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
