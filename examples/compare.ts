import { BenchmarkRunner, Reporter, createLogger, loadConfig } from "../src";

const config = loadConfig();
const logger = createLogger(config.logLevel);

const runner = new BenchmarkRunner({
  seed: config.seed,
  tolerance: config.tolerance,
  logger,
});
const reporter = new Reporter({ labels: runner.labels, color: process.stdout.isTTY === true });

const counts = [1000, 5000, 10_000, 20_000];
logger.start(`Comparing ${runner.labels.a} and ${runner.labels.b} (seed ${config.seed})`);
reporter.renderReport(runner.runAll(counts));

logger.start("Detailed analysis for 10000 operations");
reporter.renderDetails(runner.run(10_000));
logger.success("Done");
