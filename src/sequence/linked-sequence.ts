import { type Sequence, checkIndex } from "./types";

type Node<T> = {
  value: T;
  prev: Node<T> | undefined;
  next: Node<T> | undefined;
};

/**
 * Doubly linked sequence. Positional access walks from whichever end of the
 * list is closer to the requested index.
 */
export class LinkedSequence<T> implements Sequence<T> {
  private head: Node<T> | undefined;
  private tail: Node<T> | undefined;
  private length = 0;

  append(value: T): void {
    const node: Node<T> = { value, prev: this.tail, next: undefined };
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.length += 1;
  }

  insertAt(index: number, value: T): void {
    if (index === this.length) {
      this.append(value);
      return;
    }
    checkIndex(index, this.length);
    const successor = this.nodeAt(index);
    const node: Node<T> = { value, prev: successor.prev, next: successor };
    if (successor.prev) {
      successor.prev.next = node;
    } else {
      this.head = node;
    }
    successor.prev = node;
    this.length += 1;
  }

  getAt(index: number): T {
    checkIndex(index, this.length);
    return this.nodeAt(index).value;
  }

  removeAt(index: number): T {
    checkIndex(index, this.length);
    const node = this.nodeAt(index);
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }
    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }
    node.prev = undefined;
    node.next = undefined;
    this.length -= 1;
    return node.value;
  }

  size(): number {
    return this.length;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let node = this.head; node; node = node.next) {
      yield node.value;
    }
  }

  // Callers validate the index first, so the walk never runs off the list.
  private nodeAt(index: number): Node<T> {
    if (index < this.length >> 1) {
      let node = this.head;
      for (let i = 0; i < index && node; i += 1) {
        node = node.next;
      }
      return this.expectNode(node, index);
    }
    let node = this.tail;
    for (let i = this.length - 1; i > index && node; i -= 1) {
      node = node.prev;
    }
    return this.expectNode(node, index);
  }

  private expectNode(node: Node<T> | undefined, index: number): Node<T> {
    if (!node) {
      throw new RangeError(`index ${index} out of bounds for size ${this.length}`);
    }
    return node;
  }
}
