export {
  type DurationUnit,
  type Precision,
  type Recommendation,
  type Tally,
  buildRows,
  defaultPrecision,
  describeResult,
  fasterLabel,
  formatDuration,
  recommend,
  tally,
} from "./format";
export { type OutputStream, Reporter, type ReporterOptions, type UseCases } from "./reporter";
