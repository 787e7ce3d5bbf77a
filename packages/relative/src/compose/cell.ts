import { defineAbsDiffEq, defineRelativeEq } from "@approxeq/contract";
import type { RelativeEq } from "@approxeq/contract";

import type { Cell } from "../cell.js";

/** Compare two {@link Cell}s by their current values. */
export function cellOf<T, Rhs = T, E = number>(inner: RelativeEq<T, Rhs, E>): RelativeEq<Cell<T>, Cell<Rhs>, E> {
  const base = defineAbsDiffEq<Cell<T>, Cell<Rhs>, E>({
    defaultEpsilon: () => inner.defaultEpsilon(),
    cloneEpsilon: (epsilon) => inner.cloneEpsilon(epsilon),
    absDiffEq: (a, b, epsilon) => inner.absDiffEq(a.get(), b.get(), epsilon),
  });

  return defineRelativeEq(base, {
    defaultMaxRelative: () => inner.defaultMaxRelative(),
    relativeEq: (a, b, epsilon, maxRelative) => inner.relativeEq(a.get(), b.get(), epsilon, maxRelative),
  });
}
