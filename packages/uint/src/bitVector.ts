import { fill } from "@booth-uint/common";
import { UIntError } from "./errors.js";

export type NativeInteger = number | bigint;

// CLASS DEFINITION
// ================================================================================================

/**
 * An ordered sequence of bits, most significant first. Index 0 is the
 * most significant bit and `length - 1` the least significant one.
 *
 * Every resize swaps in a freshly allocated sequence; the storage is never
 * shared with another vector.
 */
export class BitVector {
  #bits: boolean[];

  // CONSTRUCTOR
  // --------------------------------------------------------------------------------------------
  constructor(bits: readonly boolean[]) {
    this.#bits = [...bits];
  }

  static zeroes(length: number): BitVector {
    return new BitVector(fill(length, false));
  }

  /**
   * Binary expansion of `value` with one leading zero bit reserved above the
   * value's own top bit. Zero becomes `0b00`.
   */
  static fromNative(value: NativeInteger): BitVector {
    let i = toBigInt(value);

    // floor(log2(i)) + 1 value bits, plus the leading zero
    const length = i === 0n ? 2 : i.toString(2).length + 1;
    const bits = fill(length, false);
    for (let b = length - 1; b >= 0; b--) {
      bits[b] = i % 2n === 1n;
      i = i >> 1n;
    }

    const vector = new BitVector(bits);
    if (vector.bit(0)) vector.padWithLeadingZeroes(1);
    return vector;
  }

  // PROPERTIES
  // --------------------------------------------------------------------------------------------
  get length(): number {
    return this.#bits.length;
  }

  bit(index: number): boolean {
    return this.#bits[index];
  }

  /** Bit `k` counted from the least significant end. */
  bitFromEnd(k: number): boolean {
    return this.#bits[this.#bits.length - 1 - k];
  }

  setBit(index: number, value: boolean) {
    this.#bits[index] = value;
  }

  setBitFromEnd(k: number, value: boolean) {
    this.#bits[this.#bits.length - 1 - k] = value;
  }

  toBits(): boolean[] {
    return [...this.#bits];
  }

  // RESIZING
  // --------------------------------------------------------------------------------------------
  replace(bits: readonly boolean[]) {
    this.#bits = [...bits];
  }

  padWithLeadingZeroes(count: number) {
    if (!Number.isInteger(count) || count < 0) {
      throw new UIntError(
        "invalid-padding",
        `cannot pad with ${count} leading zeroes`,
      );
    }
    this.#bits = [...fill(count, false), ...this.#bits];
  }

  /** Pads whichever of the two vectors is shorter so both share a width. */
  static equalize(a: BitVector, b: BitVector) {
    if (a.length > b.length) {
      b.padWithLeadingZeroes(a.length - b.length);
    } else {
      a.padWithLeadingZeroes(b.length - a.length);
    }
  }

  clone(): BitVector {
    return new BitVector(this.#bits);
  }

  // CONVERSION
  // --------------------------------------------------------------------------------------------
  toBigInt(): bigint {
    let t = 0n;
    for (const bit of this.#bits) {
      t = (t << 1n) + (bit ? 1n : 0n);
    }
    return t;
  }

  toString(): string {
    return `0b${this.#bits.map((bit) => (bit ? "1" : "0")).join("")}`;
  }
}

// HELPER FUNCTIONS
// ================================================================================================
function toBigInt(value: NativeInteger): bigint {
  if (typeof value === "number") {
    if (!Number.isInteger(value)) {
      throw new UIntError("not-an-integer", `${value} is not an integer`);
    }
    if (!Number.isSafeInteger(value)) {
      throw new UIntError(
        "unsafe-number",
        `${value} cannot be represented exactly, pass a bigint instead`,
      );
    }
  }
  if (value < 0) {
    throw new UIntError("negative", `${value} is not unsigned`);
  }
  return BigInt(value);
}
