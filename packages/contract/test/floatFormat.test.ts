import { describe, expect, it } from "vitest";

import { ApproxContractError } from "../src/errors.js";
import { BINARY32, BINARY64, floatFormatFor } from "../src/floatFormat.js";

describe("float formats", () => {
  it("exposes machine epsilon per width", () => {
    expect(BINARY32.EPSILON).toBe(1.1920928955078125e-7);
    expect(BINARY64.EPSILON).toBe(2.220446049250313e-16);
  });

  it("exposes the smallest positive normal value", () => {
    expect(BINARY32.MIN_POSITIVE).toBe(1.1754943508222875e-38);
    expect(BINARY64.MIN_POSITIVE).toBe(2.2250738585072014e-308);
  });

  it("rounds to the width", () => {
    expect(BINARY32.round(100000001)).toBe(100000000);
    expect(BINARY32.round(1.0000001)).toBe(1 + 2 ** -23);
    expect(BINARY32.round(BINARY32.MAX * 2)).toBe(Infinity);
    expect(BINARY64.round(0.1)).toBe(0.1);
  });

  it("detects infinities only", () => {
    expect(BINARY64.isInfinite(Infinity)).toBe(true);
    expect(BINARY64.isInfinite(-Infinity)).toBe(true);
    expect(BINARY64.isInfinite(Number.NaN)).toBe(false);
    expect(BINARY64.isInfinite(Number.MAX_VALUE)).toBe(false);
  });

  it("looks formats up by bit width", () => {
    expect(floatFormatFor(32)).toBe(BINARY32);
    expect(floatFormatFor(64)).toBe(BINARY64);
    expect(() => floatFormatFor(16)).toThrow(ApproxContractError);
    expect(() => floatFormatFor(16)).toThrow("unsupported float width: 16 (expected one of 32, 64)");
  });
});
