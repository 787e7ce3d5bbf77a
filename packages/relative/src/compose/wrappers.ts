import { defineAbsDiffEq, defineRelativeEq } from "@approxeq/contract";
import type { FloatFormat, RelativeEq } from "@approxeq/contract";

import { floatRelativeEq } from "../float.js";
import type { NotNan, OrderedFloat } from "../wrappers.js";

type FloatWrapper = NotNan | OrderedFloat;

function unwrap(value: FloatWrapper): number {
  return value.value;
}

function asIs(value: number): number {
  return value;
}

// Module-private: heterogeneous comparison is limited to the wrapper/number
// pairs exported below.
function forwardToFloat<L, R>(
  format: FloatFormat,
  left: (value: L) => number,
  right: (value: R) => number,
): RelativeEq<L, R> {
  const float = floatRelativeEq(format);

  const base = defineAbsDiffEq<L, R>({
    defaultEpsilon: () => float.defaultEpsilon(),
    absDiffEq: (a, b, epsilon) => float.absDiffEq(left(a), right(b), epsilon),
  });

  return defineRelativeEq(base, {
    defaultMaxRelative: () => float.defaultMaxRelative(),
    relativeEq: (a, b, epsilon, maxRelative) => float.relativeEq(left(a), right(b), epsilon, maxRelative),
  });
}

export function notNanOf(format: FloatFormat): RelativeEq<NotNan> {
  return forwardToFloat<NotNan, NotNan>(format, unwrap, unwrap);
}

/** `NotNan` on the left, a raw float on the right. */
export function notNanVsFloat(format: FloatFormat): RelativeEq<NotNan, number> {
  return forwardToFloat<NotNan, number>(format, unwrap, asIs);
}

/** A raw float on the left, `NotNan` on the right. */
export function floatVsNotNan(format: FloatFormat): RelativeEq<number, NotNan> {
  return forwardToFloat<number, NotNan>(format, asIs, unwrap);
}

export function orderedFloatOf(format: FloatFormat): RelativeEq<OrderedFloat> {
  return forwardToFloat<OrderedFloat, OrderedFloat>(format, unwrap, unwrap);
}

/** `OrderedFloat` on the left, a raw float on the right. */
export function orderedFloatVsFloat(format: FloatFormat): RelativeEq<OrderedFloat, number> {
  return forwardToFloat<OrderedFloat, number>(format, unwrap, asIs);
}

/** A raw float on the left, `OrderedFloat` on the right. */
export function floatVsOrderedFloat(format: FloatFormat): RelativeEq<number, OrderedFloat> {
  return forwardToFloat<number, OrderedFloat>(format, asIs, unwrap);
}
