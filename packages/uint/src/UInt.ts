import { BitVector, type NativeInteger } from "./bitVector.js";
import * as bitwise from "./bitwise.js";
import * as adder from "./adder.js";
import { mul } from "./booth.js";
import { UIntError } from "./errors.js";

interface BinaryOperation {
  (target: BitVector, operand: BitVector): void;
}

/**
 * Arbitrary-length unsigned integer stored one bit per slot.
 *
 * Instance methods (`and`, `add`, `mul`, ...) mutate the receiver. The static
 * methods of the same names leave both arguments untouched and return a new
 * value.
 */
export class UInt {
  readonly #vector: BitVector;

  /**
   * Builds the binary expansion of a native integer, with a leading zero bit,
   * or deep-copies another UInt.
   */
  constructor(source: NativeInteger | UInt) {
    this.#vector =
      source instanceof UInt
        ? source.#vector.clone()
        : BitVector.fromNative(source);
  }

  static from(value: NativeInteger): UInt {
    return new UInt(value);
  }

  /**
   * Rebuilds a value from its raw bits, most significant first. The bits are
   * taken as they are; nothing re-establishes a leading zero.
   */
  static fromBits(bits: readonly boolean[]): UInt {
    if (bits.length === 0) {
      throw new UIntError("empty", "a UInt needs at least one bit");
    }
    const u = new UInt(0);
    u.#vector.replace(bits);
    return u;
  }

  get length(): number {
    return this.#vector.length;
  }

  clone(): UInt {
    return new UInt(this);
  }

  static clone(u: UInt): UInt {
    return u.clone();
  }

  // CONVERSION
  // --------------------------------------------------------------------------------------------
  toBigInt(): bigint {
    return this.#vector.toBigInt();
  }

  static toBigInt(u: UInt): bigint {
    return u.toBigInt();
  }

  toNumber(): number {
    const value = this.#vector.toBigInt();
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new UIntError(
        "overflow",
        `${value} does not fit in a number, use toBigInt()`,
      );
    }
    return Number(value);
  }

  static toNumber(u: UInt): number {
    return u.toNumber();
  }

  toBits(): boolean[] {
    return this.#vector.toBits();
  }

  toString(): string {
    return this.#vector.toString();
  }

  padWithLeadingZeroes(count: number) {
    this.#vector.padWithLeadingZeroes(count);
  }

  // BITWISE OPERATIONS
  // --------------------------------------------------------------------------------------------
  and(u: UInt) {
    bitwise.and(this.#vector, u.#vector);
  }

  static and(a: UInt, b: UInt): UInt {
    return UInt.#derive(a, b, bitwise.and);
  }

  or(u: UInt) {
    bitwise.or(this.#vector, u.#vector);
  }

  static or(a: UInt, b: UInt): UInt {
    return UInt.#derive(a, b, bitwise.or);
  }

  xor(u: UInt) {
    bitwise.xor(this.#vector, u.#vector);
  }

  static xor(a: UInt, b: UInt): UInt {
    return UInt.#derive(a, b, bitwise.xor);
  }

  // ARITHMETIC
  // --------------------------------------------------------------------------------------------
  add(u: UInt) {
    adder.add(this.#vector, u.#vector);
  }

  static add(a: UInt, b: UInt): UInt {
    return UInt.#derive(a, b, adder.add);
  }

  /** Subtraction clamped at zero. */
  sub(u: UInt) {
    adder.sub(this.#vector, u.#vector);
  }

  static sub(a: UInt, b: UInt): UInt {
    return UInt.#derive(a, b, adder.sub);
  }

  mul(u: UInt) {
    mul(this.#vector, u.#vector);
  }

  static mul(a: UInt, b: UInt): UInt {
    return UInt.#derive(a, b, mul);
  }

  static #derive(a: UInt, b: UInt, op: BinaryOperation): UInt {
    const temp = a.clone();
    op(temp.#vector, b.#vector);
    return temp;
  }
}
