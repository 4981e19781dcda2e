import type { RandomSource } from "../random";
import type { Sequence } from "../sequence";

/**
 * State shared by the blocks of one run.
 */
export type OperationContext = {
  random: RandomSource;
};

/**
 * A timed block of the benchmark battery.
 */
export type BenchmarkOperation = {
  name: string;
  /** Number of loop iterations for a given operation count. */
  iterations: (operationCount: number) => number;
  /** Elements appended before the clock starts. */
  fixtureSize: (operationCount: number) => number;
  /**
   * The measured loop. Returns a value derived from what was read so the
   * reads stay observable.
   */
  execute: (sequence: Sequence<number>, iterations: number, ctx: OperationContext) => number;
};

const full = (operationCount: number): number => operationCount;
const tenth = (operationCount: number): number => Math.floor(operationCount / 10);
const twentieth = (operationCount: number): number => Math.floor(operationCount / 20);
const none = (): number => 0;

function executeAppend(sequence: Sequence<number>, iterations: number): number {
  for (let i = 0; i < iterations; i += 1) {
    sequence.append(i);
  }
  return sequence.size();
}

function executePrepend(sequence: Sequence<number>, iterations: number): number {
  for (let i = 0; i < iterations; i += 1) {
    sequence.insertAt(0, i);
  }
  return sequence.size();
}

function executeMiddleInsert(sequence: Sequence<number>, iterations: number): number {
  for (let i = 0; i < iterations; i += 1) {
    sequence.insertAt(sequence.size() >> 1, i);
  }
  return sequence.size();
}

function executeRandomRead(
  sequence: Sequence<number>,
  iterations: number,
  ctx: OperationContext
): number {
  let sink = 0;
  for (let i = 0; i < iterations; i += 1) {
    sink ^= sequence.getAt(ctx.random.nextInt(sequence.size()));
  }
  return sink;
}

function executeSequentialRead(sequence: Sequence<number>, iterations: number): number {
  let sink = 0;
  for (let i = 0; i < iterations; i += 1) {
    sink ^= sequence.getAt(i % sequence.size());
  }
  return sink;
}

function executeRemoveFront(sequence: Sequence<number>, iterations: number): number {
  let sink = 0;
  for (let i = 0; i < iterations; i += 1) {
    if (sequence.size() === 0) break;
    sink ^= sequence.removeAt(0);
  }
  return sink;
}

function executeRemoveBack(sequence: Sequence<number>, iterations: number): number {
  let sink = 0;
  for (let i = 0; i < iterations; i += 1) {
    if (sequence.size() === 0) break;
    sink ^= sequence.removeAt(sequence.size() - 1);
  }
  return sink;
}

function executeRemoveMiddle(sequence: Sequence<number>, iterations: number): number {
  let sink = 0;
  for (let i = 0; i < iterations; i += 1) {
    if (sequence.size() === 0) break;
    sink ^= sequence.removeAt(sequence.size() >> 1);
  }
  return sink;
}

function executeIterate(sequence: Sequence<number>): number {
  let sink = 0;
  for (const value of sequence) {
    sink ^= value;
  }
  return sink;
}

/**
 * The fixed battery. Positional inserts and removals run a tenth (or a
 * twentieth) of the operation count because they are linear per call for at
 * least one variant.
 */
export const defaultOperations: readonly BenchmarkOperation[] = [
  { name: "append", iterations: full, fixtureSize: none, execute: executeAppend },
  { name: "prepend", iterations: tenth, fixtureSize: tenth, execute: executePrepend },
  { name: "middle-insert", iterations: tenth, fixtureSize: tenth, execute: executeMiddleInsert },
  { name: "random-read", iterations: full, fixtureSize: full, execute: executeRandomRead },
  { name: "sequential-read", iterations: full, fixtureSize: full, execute: executeSequentialRead },
  {
    name: "remove-front",
    iterations: tenth,
    fixtureSize: (operationCount) => 2 * tenth(operationCount),
    execute: executeRemoveFront,
  },
  {
    name: "remove-back",
    iterations: tenth,
    fixtureSize: (operationCount) => 2 * tenth(operationCount),
    execute: executeRemoveBack,
  },
  {
    name: "remove-middle",
    iterations: twentieth,
    fixtureSize: (operationCount) => 3 * twentieth(operationCount),
    execute: executeRemoveMiddle,
  },
];

/**
 * The default battery followed by a full in-order traversal.
 */
export const extendedOperations: readonly BenchmarkOperation[] = [
  ...defaultOperations,
  { name: "iterate", iterations: full, fixtureSize: full, execute: executeIterate },
];
