import { BINARY32, BINARY64, defineRelativeEq } from "@approxeq/contract";
import type { FloatFormat, RelativeEq } from "@approxeq/contract";

import { floatAbsDiffEq } from "./absDiff.js";

/**
 * Relative comparator for an IEEE binary width.
 *
 * Based on "Comparing Floating Point Numbers, 2012 Edition" (Bruce Dawson).
 *
 * Evaluation order matters for special values:
 * 1. native equality (`+0 === -0`, same-sign infinities) => equal
 * 2. any remaining infinity => not equal
 * 3. `|a - b| <= epsilon` => equal (values near zero)
 * 4. `|a - b| <= max(|a|, |b|) * maxRelative`
 *
 * NaN fails every step, so it is never equal to anything, itself included.
 *
 * Operands, tolerances and every intermediate result are rounded to the width,
 * so binary32 comparisons match native single-precision arithmetic.
 */
export function floatRelativeEq(format: FloatFormat): RelativeEq<number> {
  const { round, abs, isInfinite } = format;

  return defineRelativeEq(floatAbsDiffEq(format), {
    defaultMaxRelative: () => format.EPSILON,
    relativeEq: (lhs, rhs, epsilon, maxRelative) => {
      const a = round(lhs);
      const b = round(rhs);

      if (a === b) return true;

      if (isInfinite(a) || isInfinite(b)) return false;

      const absDiff = abs(round(a - b));

      if (absDiff <= round(epsilon)) return true;

      const absA = abs(a);
      const absB = abs(b);
      const largest = absB > absA ? absB : absA;

      return absDiff <= round(largest * round(maxRelative));
    },
  });
}

/** Single-precision (binary32) comparator. */
export const f32: RelativeEq<number> = floatRelativeEq(BINARY32);

/** Double-precision (binary64) comparator. This is the width of every JS number. */
export const f64: RelativeEq<number> = floatRelativeEq(BINARY64);
