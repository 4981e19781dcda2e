import Table from "cli-table3";
import type { ResultSet } from "../result";
import type { VariantLabels } from "../runner";
import { arrayVariant, linkedVariant } from "../sequence";
import {
  type DurationUnit,
  type Precision,
  type Recommendation,
  buildRows,
  defaultPrecision,
  describeResult,
  recommend,
  tally,
} from "./format";

/**
 * Anything that accepts text, such as `process.stdout`.
 */
export type OutputStream = {
  write(chunk: string): unknown;
};

/**
 * Typical workloads printed under a recommendation.
 */
export type UseCases = {
  a: readonly string[];
  b: readonly string[];
  depends: readonly string[];
};

/**
 * Options controlling report output.
 */
export interface ReporterOptions {
  /** Variant display names. */
  labels?: VariantLabels;
  /** Destination of every rendered line. */
  stream?: OutputStream;
  /** Colour table headers. */
  color?: boolean;
  /** Workloads listed under each recommendation. */
  useCases?: UseCases;
  /** Decimal places for milliseconds and ratios. */
  precision?: Partial<Precision>;
  /** Closing notes printed after the detailed analysis; empty to omit. */
  conclusions?: readonly string[];
}

const defaultUseCases: UseCases = {
  a: [
    "frequent access by index",
    "appending and removing at the end",
    "memory-sensitive workloads",
  ],
  b: [
    "frequent inserts and removals at the front or middle",
    "queues (FIFO) and stacks (LIFO)",
    "workloads dominated by structural changes",
  ],
  depends: ["indexed reads favour contiguous storage", "positional edits favour linked nodes"],
};

const defaultConclusions: readonly string[] = [
  "1. Contiguous arrays are usually faster for:",
  "   - access by index",
  "   - appending at the end",
  "   - removing from the end",
  "2. Linked nodes are usually faster for:",
  "   - inserting at the front",
  "   - removing from the front",
  "   - inserting in the middle of large sequences",
  "3. Memory:",
  "   - arrays store no per-element links",
  "   - every linked node carries previous and next references",
  "4. In practice:",
  "   - prefer arrays for read-heavy workloads",
  "   - prefer linked nodes for edits at the front",
  "   - for mixed workloads, follow the dominant operation",
];

const RULE_WIDTH = 70;

/**
 * Reporter renders benchmark results as tables, summaries and a detailed
 * analysis.
 */
export class Reporter {
  private readonly labels: VariantLabels;
  private readonly stream: OutputStream;
  private readonly color: boolean;
  private readonly useCases: UseCases;
  private readonly precision: Precision;
  private readonly conclusions: readonly string[];

  constructor(options: ReporterOptions = {}) {
    this.labels = options.labels ?? { a: arrayVariant.label, b: linkedVariant.label };
    this.stream = options.stream ?? process.stdout;
    this.color = options.color ?? false;
    this.useCases = options.useCases ?? defaultUseCases;
    this.precision = { ...defaultPrecision, ...options.precision };
    this.conclusions = options.conclusions ?? defaultConclusions;
  }

  /**
   * Render one row per result with durations in the given unit.
   */
  formatTable(results: ResultSet, unit: DurationUnit): string {
    const table = new Table({
      head: [
        "Operation",
        "Iterations",
        `${this.labels.a} (${unit})`,
        `${this.labels.b} (${unit})`,
        "Ratio",
        "Faster",
      ],
      colAligns: ["left", "right", "right", "right", "right", "left"],
      style: this.color ? { head: ["cyan"] } : { head: [], border: [] },
    });
    for (const row of buildRows(results, unit, this.labels, this.precision)) {
      table.push(row);
    }
    return table.toString();
  }

  renderTable(results: ResultSet, unit: DurationUnit): void {
    this.writeLines([`Results (${unit})`, this.formatTable(results, unit)]);
  }

  /**
   * Tally wins and ties, then print the recommendation they lead to.
   */
  formatSummary(results: ResultSet): string[] {
    const counts = tally(results);
    const recommendation = recommend(counts);
    return [
      "=".repeat(RULE_WIDTH),
      "Summary",
      "=".repeat(RULE_WIDTH),
      `${this.labels.a} wins: ${counts.aWins}`,
      `${this.labels.b} wins: ${counts.bWins}`,
      `Ties: ${counts.ties}`,
      "",
      this.recommendationHeadline(recommendation),
      ...this.useCasesFor(recommendation).map((useCase) => `  - ${useCase}`),
    ];
  }

  renderSummary(results: ResultSet): void {
    this.writeLines(this.formatSummary(results));
  }

  /**
   * Per-result analysis followed by the closing conclusions, if any.
   */
  formatDetails(results: ResultSet): string[] {
    const lines = results.flatMap((result) => describeResult(result, this.labels, this.precision));
    if (this.conclusions.length === 0) {
      return lines;
    }
    return [
      ...lines,
      "",
      "=".repeat(RULE_WIDTH),
      "Conclusions",
      "=".repeat(RULE_WIDTH),
      ...this.conclusions,
    ];
  }

  renderDetails(results: ResultSet): void {
    this.writeLines(this.formatDetails(results));
  }

  /**
   * Render tables and a summary for each operation count, in map order.
   */
  renderReport(sets: ReadonlyMap<number, ResultSet>): void {
    for (const [operationCount, results] of sets) {
      this.writeLines(["", `${operationCount} operations`, "-".repeat(RULE_WIDTH)]);
      this.renderTable(results, "ns");
      this.renderTable(results, "ms");
      this.renderSummary(results);
    }
  }

  private recommendationHeadline(recommendation: Recommendation): string {
    switch (recommendation) {
      case "A":
        return `Recommendation: ${this.labels.a} performed better in most operations. It suits:`;
      case "B":
        return `Recommendation: ${this.labels.b} performed better in most operations. It suits:`;
      case "depends":
        return "Recommendation: depends on workload. The choice follows the dominant operation:";
    }
  }

  private useCasesFor(recommendation: Recommendation): readonly string[] {
    switch (recommendation) {
      case "A":
        return this.useCases.a;
      case "B":
        return this.useCases.b;
      case "depends":
        return this.useCases.depends;
    }
  }

  private writeLines(lines: readonly string[]): void {
    this.stream.write(`${lines.join("\n")}\n`);
  }
}
