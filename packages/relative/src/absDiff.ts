import { defineAbsDiffEq } from "@approxeq/contract";
import type { AbsDiffEq, FloatFormat } from "@approxeq/contract";

/**
 * Absolute-difference comparator for an IEEE binary width.
 *
 * `|a - b| <= epsilon`, computed in the width's own arithmetic. The default
 * tolerance is the width's machine epsilon.
 *
 * Infinities are not special-cased here: `Infinity - Infinity` is NaN, so two
 * equal infinities are *not* absolute-difference equal. The relative comparator
 * handles them before it ever reaches this test.
 */
export function floatAbsDiffEq(format: FloatFormat): AbsDiffEq<number> {
  const { round } = format;

  return defineAbsDiffEq({
    defaultEpsilon: () => format.EPSILON,
    absDiffEq: (lhs, rhs, epsilon) => {
      const a = round(lhs);
      const b = round(rhs);
      const diff = a > b ? round(a - b) : round(b - a);
      return diff <= round(epsilon);
    },
  });
}
