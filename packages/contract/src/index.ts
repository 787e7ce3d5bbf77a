export type { AbsDiffEq, RelativeEq } from "./types.js";

export { defineAbsDiffEq, defineRelativeEq } from "./define.js";
export type { AbsDiffEqImpl, RelativeEqImpl } from "./define.js";

export { BINARY32, BINARY64, FLOAT_BITS, floatFormatFor, isFloatFormat } from "./floatFormat.js";
export type { FloatBits, FloatFormat } from "./floatFormat.js";

export { ApproxContractError } from "./errors.js";
