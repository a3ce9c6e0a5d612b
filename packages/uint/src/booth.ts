import { BitVector } from "./bitVector.js";
import { addIgnoringFinalCarry, negate } from "./adder.js";

/**
 * Shifts every bit one place toward the least significant end, replicating
 * the most significant bit.
 */
function arithmeticShiftRight(register: BitVector) {
  for (let i = register.length - 1; i > 0; i--) {
    register.setBit(i, register.bit(i - 1));
  }
}

/** An all-zero register of `width` bits with `bits` copied in at `offset`. */
function register(width: number, bits: BitVector, offset: number): BitVector {
  const r = BitVector.zeroes(width);
  for (let i = 0; i < bits.length; i++) {
    r.setBit(offset + i, bits.bit(i));
  }
  return r;
}

/**
 * `target *= operand` by Booth's algorithm.
 *
 * Both operands are read as two's complement numbers of a shared width `n`,
 * so each needs a clear top bit to be taken as non-negative; operands that
 * lost their leading zero to an earlier mutation are widened by one bit.
 * The product is left in `target` at width `2n + 1`, or `2n` after widening:
 * both operands then sit below `2^(n-1)`, so the top two product bits are
 * zero and one of them is dropped.
 */
export function mul(target: BitVector, operand: BitVector) {
  const m = target.clone();
  const r = operand.clone();
  BitVector.equalize(m, r);
  const widened = m.bit(0) || r.bit(0);
  if (widened) {
    m.padWithLeadingZeroes(1);
    r.padWithLeadingZeroes(1);
  }

  const numCycles = m.length;
  const width = 2 * numCycles + 1;

  const negatedM = m.clone();
  negate(negatedM);

  const A = register(width, m, 0);
  const S = register(width, negatedM, 0);
  const P = register(width, r, numCycles);

  for (let cycle = 0; cycle < numCycles; cycle++) {
    const secondToLast = P.bitFromEnd(1);
    const last = P.bitFromEnd(0);
    if (!secondToLast && last) {
      addIgnoringFinalCarry(P, A);
    } else if (secondToLast && !last) {
      addIgnoringFinalCarry(P, S);
    }
    arithmeticShiftRight(P);
  }

  // the last bit of P is Booth's scratch bit
  const product = P.toBits().slice(0, width - 1);
  target.replace(widened ? product : [false, ...product]);
}
