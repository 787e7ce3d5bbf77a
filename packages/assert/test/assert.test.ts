import { describe, expect, it } from "vitest";

import { BINARY64 } from "@approxeq/contract";
import { complex, complexOf, f32, f64, NotNan, notNanVsFloat, sliceOf } from "@approxeq/relative";

import { assertAbsDiffEq, assertAbsDiffNe, assertRelativeEq, assertRelativeNe } from "../src/assert.js";
import { ApproxAssertionError } from "../src/errors.js";

const EPS = "2.220446049250313e-16";

function thrown(fn: () => void): ApproxAssertionError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ApproxAssertionError) return err;
    throw err;
  }
  throw new Error("expected an ApproxAssertionError");
}

describe("assertRelativeEq / assertRelativeNe", () => {
  it("passes for relatively equal values", () => {
    expect(() => assertRelativeEq(f64, 1, 1)).not.toThrow();
    expect(() => assertRelativeEq(f32, 100000000, 100000001)).not.toThrow();
    expect(() => assertRelativeEq(f64, 1, 1.5, { maxRelative: 0.34 })).not.toThrow();
    expect(() => assertRelativeNe(f64, 1, 1.5, { maxRelative: 0.33 })).not.toThrow();
  });

  it("reports both operands and the effective tolerances", () => {
    const err = thrown(() => assertRelativeEq(f64, 1, 2));

    expect(err.message).toBe(
      [`assertRelativeEq failed (epsilon = ${EPS}, maxRelative = ${EPS})`, "  left:  1", "  right: 2"].join("\n"),
    );
    expect(err.assertion).toBe("assertRelativeEq");
    expect(err.left).toBe(1);
    expect(err.right).toBe(2);
    expect(err.epsilon).toBe(Number.EPSILON);
    expect(err.maxRelative).toBe(Number.EPSILON);
  });

  it("reports overridden tolerances", () => {
    const err = thrown(() => assertRelativeEq(f64, 1, 1.5, { epsilon: 0.1, maxRelative: 0.33 }));
    expect(err.message.split("\n")[0]).toBe("assertRelativeEq failed (epsilon = 0.1, maxRelative = 0.33)");
  });

  it("fails assertRelativeNe for equal values", () => {
    const err = thrown(() => assertRelativeNe(f64, 1, 1));
    expect(err.message).toBe(
      [`assertRelativeNe failed (epsilon = ${EPS}, maxRelative = ${EPS})`, "  left:  1", "  right: 1"].join("\n"),
    );
  });

  it("prefixes a caller message", () => {
    const err = thrown(() => assertRelativeEq(f64, 0, -1, { message: "velocity" }));
    expect(err.message.split("\n")[0]).toBe(
      `velocity: assertRelativeEq failed (epsilon = ${EPS}, maxRelative = ${EPS})`,
    );
  });

  it("renders composite operands", () => {
    const err = thrown(() => assertRelativeEq(sliceOf(f64), [1, 2], [1, 2, 3]));
    expect(err.message.split("\n").slice(1)).toEqual(["  left:  [1, 2]", "  right: [1, 2, 3]"]);

    const c = thrown(() => assertRelativeEq(complexOf(f64), complex(1, 2), complex(2, 1)));
    expect(c.message.split("\n").slice(1)).toEqual(["  left:  { re: 1, im: 2 }", "  right: { re: 2, im: 1 }"]);
  });

  it("renders wrapper operands against raw floats", () => {
    const err = thrown(() => assertRelativeEq(notNanVsFloat(BINARY64), new NotNan(1), Number.NaN));
    expect(err.message.split("\n").slice(1)).toEqual(["  left:  NotNan(1)", "  right: NaN"]);
  });
});

describe("assertAbsDiffEq / assertAbsDiffNe", () => {
  it("passes within the tolerance", () => {
    expect(() => assertAbsDiffEq(f64, 1, 1.25, { epsilon: 0.25 })).not.toThrow();
    expect(() => assertAbsDiffNe(f64, 1, 1.5, { epsilon: 0.25 })).not.toThrow();
  });

  it("reports only the absolute tolerance", () => {
    const err = thrown(() => assertAbsDiffEq(f64, 1, 1.5, { epsilon: 0.25 }));
    expect(err.message).toBe(["assertAbsDiffEq failed (epsilon = 0.25)", "  left:  1", "  right: 1.5"].join("\n"));
    expect(err.maxRelative).toBeUndefined();
  });

  it("fails assertAbsDiffNe for close values", () => {
    const err = thrown(() => assertAbsDiffNe(f64, -0, 0));
    expect(err.message).toBe([`assertAbsDiffNe failed (epsilon = ${EPS})`, "  left:  -0", "  right: 0"].join("\n"));
  });
});
