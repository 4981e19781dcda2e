import { BenchmarkRunner, Reporter, extendedOperations } from "../src";

// Differences under 5% of the slower duration count as ties.
const runner = new BenchmarkRunner({
  tolerance: { kind: "relative", ratio: 0.05 },
  operations: extendedOperations,
});
const results = runner.run(5000);

const reporter = new Reporter({ labels: runner.labels });
reporter.renderTable(results, "ms");
reporter.renderSummary(results);
