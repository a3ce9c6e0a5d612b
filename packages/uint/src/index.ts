import { UInt } from "./UInt.js";

export { UInt };
export { UIntError } from "./errors.js";
export type { UIntErrorCode } from "./errors.js";
export type { NativeInteger } from "./bitVector.js";
export default UInt;
