import { defineAbsDiffEq, defineRelativeEq } from "@approxeq/contract";
import type { RelativeEq } from "@approxeq/contract";

import type { Complex } from "../complex.js";

/** Real parts equal and imaginary parts equal, each with its own tolerance copy. */
export function complexOf<T, Rhs = T, E = number>(
  inner: RelativeEq<T, Rhs, E>,
): RelativeEq<Complex<T>, Complex<Rhs>, E> {
  const base = defineAbsDiffEq<Complex<T>, Complex<Rhs>, E>({
    defaultEpsilon: () => inner.defaultEpsilon(),
    cloneEpsilon: (epsilon) => inner.cloneEpsilon(epsilon),
    absDiffEq: (a, b, epsilon) =>
      inner.absDiffEq(a.re, b.re, inner.cloneEpsilon(epsilon)) &&
      inner.absDiffEq(a.im, b.im, inner.cloneEpsilon(epsilon)),
  });

  return defineRelativeEq(base, {
    defaultMaxRelative: () => inner.defaultMaxRelative(),
    relativeEq: (a, b, epsilon, maxRelative) =>
      inner.relativeEq(a.re, b.re, inner.cloneEpsilon(epsilon), inner.cloneEpsilon(maxRelative)) &&
      inner.relativeEq(a.im, b.im, inner.cloneEpsilon(epsilon), inner.cloneEpsilon(maxRelative)),
  });
}
