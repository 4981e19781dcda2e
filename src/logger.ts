import { type ConsolaInstance, type LogType, LogLevels, createConsola } from "consola";

/** Level names accepted by `createLogger` and `SEQBENCH_LOG_LEVEL`. */
export type LogLevelName = LogType;

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LogLevels, value);
}

/**
 * Create the tagged logger used across seqbench.
 */
export function createLogger(level: LogLevelName = "info"): ConsolaInstance {
  return createConsola({ level: LogLevels[level] }).withTag("seqbench");
}
