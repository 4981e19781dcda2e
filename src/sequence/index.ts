import { ArraySequence } from "./array-sequence";
import { LinkedSequence } from "./linked-sequence";
import type { SequenceVariant } from "./types";

export { ArraySequence } from "./array-sequence";
export { LinkedSequence } from "./linked-sequence";
export type { Sequence, SequenceVariant } from "./types";

/** Variant A: contiguous array storage. */
export const arrayVariant: SequenceVariant = {
  label: "ArraySequence",
  create: () => new ArraySequence<number>(),
};

/** Variant B: doubly linked nodes. */
export const linkedVariant: SequenceVariant = {
  label: "LinkedSequence",
  create: () => new LinkedSequence<number>(),
};
