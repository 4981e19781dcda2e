/**
 * Minimal capability set shared by every benchmarked container.
 *
 * Indices are zero-based. `insertAt` accepts `0..size()`; `getAt` and
 * `removeAt` accept `0..size()-1` and throw a `RangeError` otherwise.
 */
export interface Sequence<T> extends Iterable<T> {
  append(value: T): void;
  insertAt(index: number, value: T): void;
  getAt(index: number): T;
  removeAt(index: number): T;
  size(): number;
}

/**
 * A named container factory. The runner creates a fresh instance for every
 * timed block.
 */
export type SequenceVariant = {
  label: string;
  create: () => Sequence<number>;
};

export function checkIndex(index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new RangeError(`index ${index} out of bounds for size ${size}`);
  }
}
