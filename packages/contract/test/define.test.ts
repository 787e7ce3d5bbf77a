import { describe, expect, it } from "vitest";

import { defineAbsDiffEq, defineRelativeEq } from "../src/define.js";
import { ApproxContractError } from "../src/errors.js";
import type { AbsDiffEqImpl, RelativeEqImpl } from "../src/define.js";

// Integer "distance" comparator used only to exercise the constructors.
const intAbs = defineAbsDiffEq<number>({
  defaultEpsilon: () => 1,
  absDiffEq: (a, b, epsilon) => Math.abs(a - b) <= epsilon,
});

describe("defineAbsDiffEq", () => {
  it("derives absDiffNe as the negation of absDiffEq", () => {
    expect(intAbs.absDiffEq(3, 4, 1)).toBe(true);
    expect(intAbs.absDiffNe(3, 4, 1)).toBe(false);
    expect(intAbs.absDiffEq(3, 5, 1)).toBe(false);
    expect(intAbs.absDiffNe(3, 5, 1)).toBe(true);
  });

  it("uses identity as the default tolerance clone", () => {
    expect(intAbs.cloneEpsilon(0.25)).toBe(0.25);
    expect(intAbs.defaultEpsilon()).toBe(1);
  });

  it("forwards a supplied cloneEpsilon", () => {
    type Tol = { value: number };
    const cmp = defineAbsDiffEq<number, number, Tol>({
      defaultEpsilon: () => ({ value: 0 }),
      cloneEpsilon: (e) => ({ value: e.value }),
      absDiffEq: (a, b, e) => Math.abs(a - b) <= e.value,
    });

    const tol = { value: 2 };
    const copy = cmp.cloneEpsilon(tol);
    expect(copy).toEqual({ value: 2 });
    expect(copy).not.toBe(tol);
  });

  it("rejects an implementation that carries its own absDiffNe", () => {
    const impl = {
      defaultEpsilon: () => 1,
      absDiffEq: () => true,
      absDiffNe: () => true,
    } as unknown as AbsDiffEqImpl<number>;

    expect(() => defineAbsDiffEq(impl)).toThrow(ApproxContractError);
    expect(() => defineAbsDiffEq(impl)).toThrow(/absDiffNe/);
  });

  it("returns a frozen comparator", () => {
    expect(Object.isFrozen(intAbs)).toBe(true);
  });
});

describe("defineRelativeEq", () => {
  const scaled = defineRelativeEq(intAbs, {
    defaultMaxRelative: () => 0.1,
    relativeEq: (a, b, epsilon, maxRelative) =>
      intAbs.absDiffEq(a, b, epsilon) || Math.abs(a - b) <= Math.max(Math.abs(a), Math.abs(b)) * maxRelative,
  });

  it("delegates the absolute-difference half to the base comparator", () => {
    expect(scaled.defaultEpsilon()).toBe(1);
    expect(scaled.absDiffEq(10, 11, 1)).toBe(true);
    expect(scaled.absDiffNe(10, 12, 1)).toBe(true);
    expect(scaled.cloneEpsilon(3)).toBe(3);
  });

  it("derives relativeNe as the negation of relativeEq", () => {
    const cases: Array<[number, number]> = [
      [100, 109],
      [100, 111],
      [0, 0],
      [1, 3],
    ];
    for (const [a, b] of cases) {
      expect(scaled.relativeNe(a, b, 1, 0.1)).toBe(!scaled.relativeEq(a, b, 1, 0.1));
    }
    expect(scaled.relativeEq(100, 109, 1, 0.1)).toBe(true);
    expect(scaled.relativeEq(100, 120, 1, 0.1)).toBe(false);
  });

  it("rejects an implementation that carries its own relativeNe", () => {
    const impl = {
      defaultMaxRelative: () => 0,
      relativeEq: () => false,
      relativeNe: () => false,
    } as unknown as RelativeEqImpl<number>;

    expect(() => defineRelativeEq(intAbs, impl)).toThrow(
      "defineRelativeEq(): `relativeNe` is derived from the equality test and cannot be overridden",
    );
  });
});
