import { ApproxContractError } from "./errors.js";

export const FLOAT_BITS = [32, 64] as const;
export type FloatBits = (typeof FLOAT_BITS)[number];

/**
 * Capabilities of an IEEE-754 binary floating-point width.
 *
 * JS numbers are always binary64, so narrower widths are emulated by rounding
 * every operand and every intermediate result with {@link FloatFormat.round}.
 */
export interface FloatFormat {
  readonly name: "binary32" | "binary64";
  readonly bits: FloatBits;

  /** Machine epsilon: distance from 1.0 to the next representable value. */
  readonly EPSILON: number;

  /** Largest finite value. */
  readonly MAX: number;

  /** Smallest positive normal value. */
  readonly MIN_POSITIVE: number;

  /** Round a JS number to the nearest value representable in this width. */
  round(x: number): number;

  abs(x: number): number;

  isInfinite(x: number): boolean;
}

function isInfinite(x: number): boolean {
  return x === Infinity || x === -Infinity;
}

export const BINARY32: FloatFormat = Object.freeze({
  name: "binary32",
  bits: 32,
  EPSILON: 2 ** -23,
  MAX: 3.4028234663852886e38,
  MIN_POSITIVE: 2 ** -126,
  round: (x: number) => Math.fround(x),
  abs: (x: number) => Math.abs(x),
  isInfinite,
});

export const BINARY64: FloatFormat = Object.freeze({
  name: "binary64",
  bits: 64,
  EPSILON: Number.EPSILON,
  MAX: Number.MAX_VALUE,
  MIN_POSITIVE: 2 ** -1022,
  round: (x: number) => x,
  abs: (x: number) => Math.abs(x),
  isInfinite,
});

export function isFloatFormat(value: unknown): value is FloatFormat {
  return value === BINARY32 || value === BINARY64;
}

/** Look up the format for a bit width. Throws for anything but 32 or 64. */
export function floatFormatFor(bits: number): FloatFormat {
  switch (bits) {
    case 32:
      return BINARY32;
    case 64:
      return BINARY64;
    default:
      throw new ApproxContractError(`unsupported float width: ${String(bits)} (expected one of ${FLOAT_BITS.join(", ")})`);
  }
}
