export {
  type BenchmarkOperation,
  type OperationContext,
  defaultOperations,
  extendedOperations,
} from "./operations";
export {
  BenchmarkRunner,
  type BenchmarkRunnerOptions,
  type VariantLabels,
  type VariantPair,
} from "./runner";
