import type { BitVector } from "./bitVector.js";

interface BitOperation {
  (a: boolean, b: boolean): boolean;
}

/**
 * Combines `target` with `operand` bit by bit, aligned at the least
 * significant end, writing into `target`. The width of `target` never
 * changes.
 */
function combine(target: BitVector, operand: BitVector, op: BitOperation) {
  const overlap = Math.min(target.length, operand.length);
  for (let k = 0; k < overlap; k++) {
    target.setBitFromEnd(k, op(target.bitFromEnd(k), operand.bitFromEnd(k)));
  }
}

export function and(target: BitVector, operand: BitVector) {
  combine(target, operand, (a, b) => a && b);

  // the shorter operand is implicitly zero above its width
  for (let k = operand.length; k < target.length; k++) {
    target.setBitFromEnd(k, false);
  }
}

export function or(target: BitVector, operand: BitVector) {
  combine(target, operand, (a, b) => a || b);
}

export function xor(target: BitVector, operand: BitVector) {
  combine(target, operand, (a, b) => a !== b);
}
