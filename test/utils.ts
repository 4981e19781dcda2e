import type { Clock } from "../src/clock";
import type { OutputStream } from "../src/reporter";
import { ArraySequence, LinkedSequence, type Sequence, type SequenceVariant } from "../src/sequence";

/**
 * Clock whose consecutive start/end readings are `durations` apart, cycling
 * through the list. `calls` counts readings.
 */
export function scriptedClock(durations: readonly number[]): Clock & { calls: number } {
  let now = 0n;
  let next = 0;
  const clock: Clock & { calls: number } = {
    calls: 0,
    now(): bigint {
      clock.calls += 1;
      if (clock.calls % 2 === 0) {
        now += BigInt(durations[next % durations.length] ?? 0);
        next += 1;
      }
      return now;
    },
  };
  return clock;
}

/**
 * Variant that keeps every sequence it creates.
 */
export function recordingVariant(
  label: string,
  create: () => Sequence<number>
): SequenceVariant & { created: Sequence<number>[] } {
  const created: Sequence<number>[] = [];
  return {
    label,
    created,
    create: () => {
      const sequence = create();
      created.push(sequence);
      return sequence;
    },
  };
}

export const recordingArray = () =>
  recordingVariant("Arr", () => new ArraySequence<number>());
export const recordingLinked = () =>
  recordingVariant("Lnk", () => new LinkedSequence<number>());

/**
 * Stream that collects everything written to it.
 */
export function captureStream(): OutputStream & { text: () => string } {
  const chunks: string[] = [];
  return {
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(""),
  };
}
