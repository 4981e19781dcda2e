import { type Sequence, checkIndex } from "./types";

/**
 * Sequence backed by a contiguous JavaScript array.
 */
export class ArraySequence<T> implements Sequence<T> {
  private readonly items: T[] = [];

  append(value: T): void {
    this.items.push(value);
  }

  insertAt(index: number, value: T): void {
    if (index === this.items.length) {
      this.items.push(value);
      return;
    }
    checkIndex(index, this.items.length);
    this.items.splice(index, 0, value);
  }

  getAt(index: number): T {
    checkIndex(index, this.items.length);
    return this.items[index]!;
  }

  removeAt(index: number): T {
    checkIndex(index, this.items.length);
    if (index === this.items.length - 1) {
      return this.items.pop()!;
    }
    return this.items.splice(index, 1)[0]!;
  }

  size(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
