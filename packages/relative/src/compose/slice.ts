import { defineAbsDiffEq, defineRelativeEq } from "@approxeq/contract";
import type { RelativeEq } from "@approxeq/contract";

function everyPair<T, Rhs>(a: ArrayLike<T>, b: ArrayLike<Rhs>, test: (x: T, y: Rhs) => boolean): boolean {
  // Length mismatch is never subject to tolerance.
  if (a.length !== b.length) return false;

  for (let i = 0; i < a.length; i++) {
    if (!test(a[i], b[i])) return false;
  }
  return true;
}

/**
 * Compare two fixed-length sequences element by element.
 *
 * Sequences of different length are never equal. Otherwise every index must be
 * equal; the first mismatch short-circuits. Each element gets its own copy of
 * the tolerances (via `inner.cloneEpsilon`).
 *
 * Accepts anything array-like, so `Float32Array` and `Float64Array` work too.
 */
export function sliceOf<T, Rhs = T, E = number>(
  inner: RelativeEq<T, Rhs, E>,
): RelativeEq<ArrayLike<T>, ArrayLike<Rhs>, E> {
  const base = defineAbsDiffEq<ArrayLike<T>, ArrayLike<Rhs>, E>({
    defaultEpsilon: () => inner.defaultEpsilon(),
    cloneEpsilon: (epsilon) => inner.cloneEpsilon(epsilon),
    absDiffEq: (a, b, epsilon) => everyPair(a, b, (x, y) => inner.absDiffEq(x, y, inner.cloneEpsilon(epsilon))),
  });

  return defineRelativeEq(base, {
    defaultMaxRelative: () => inner.defaultMaxRelative(),
    relativeEq: (a, b, epsilon, maxRelative) =>
      everyPair(a, b, (x, y) =>
        inner.relativeEq(x, y, inner.cloneEpsilon(epsilon), inner.cloneEpsilon(maxRelative)),
      ),
  });
}
