export type UIntErrorCode =
  | "negative"
  | "not-an-integer"
  | "unsafe-number"
  | "overflow"
  | "empty"
  | "invalid-padding";

export class UIntError extends Error {
  readonly code: UIntErrorCode;

  constructor(code: UIntErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = "UIntError";
    this.code = code;
  }
}
