import { fill } from "@booth-uint/common";
import { BitVector } from "./bitVector.js";

/**
 * Ripple-carry adder over two vectors padded to a common width. Returns the
 * sum bits (most significant first) and the carry out of the top position.
 * `target` is padded in place; `operand` only on a private copy.
 */
function rippleCarry(
  target: BitVector,
  operand: BitVector,
): { sum: boolean[]; carry: boolean } {
  const addend = operand.clone();
  BitVector.equalize(target, addend);

  const width = target.length;
  const sum = fill(width, false);
  let carry = false;
  for (let k = 0; k < width; k++) {
    const a = target.bitFromEnd(k);
    const b = addend.bitFromEnd(k);
    sum[width - 1 - k] = a !== b !== carry;
    // majority of the three inputs
    carry = (a && b) || (a && carry) || (b && carry);
  }
  return { sum, carry };
}

/** `target += operand`, growing by one bit to hold the final carry. */
export function add(target: BitVector, operand: BitVector) {
  const { sum, carry } = rippleCarry(target, operand);
  target.replace([carry, ...sum]);
}

/** `target += operand` at the wider operand's width, dropping the final carry. */
export function addIgnoringFinalCarry(target: BitVector, operand: BitVector) {
  target.replace(rippleCarry(target, operand).sum);
}

/** Two's complement negation within the current width. */
export function negate(target: BitVector) {
  for (let i = 0; i < target.length; i++) {
    target.setBit(i, !target.bit(i));
  }

  // same width as target: padding after the flip would change the value
  const one = BitVector.zeroes(target.length);
  one.setBitFromEnd(0, true);
  addIgnoringFinalCarry(target, one);
}

/**
 * `target -= operand`, saturating at zero. Underflow is detected on the
 * native magnitudes before any bits are touched.
 */
export function sub(target: BitVector, operand: BitVector) {
  const underflows = target.toBigInt() < operand.toBigInt();

  const subtrahend = operand.clone();
  BitVector.equalize(target, subtrahend);
  negate(subtrahend);
  addIgnoringFinalCarry(target, subtrahend);

  if (underflows) target.replace([false]);
}
