import { defineAbsDiffEq, defineRelativeEq } from "@approxeq/contract";
import type { RelativeEq } from "@approxeq/contract";

/**
 * Reference to a value: an immutable `{ readonly current }` or a mutable
 * `{ current }` ref object. Both compare the same way.
 */
export type Ref<T> = { readonly current: T };

/** Compare two refs by the values they point at. */
export function refOf<T, Rhs = T, E = number>(inner: RelativeEq<T, Rhs, E>): RelativeEq<Ref<T>, Ref<Rhs>, E> {
  const base = defineAbsDiffEq<Ref<T>, Ref<Rhs>, E>({
    defaultEpsilon: () => inner.defaultEpsilon(),
    cloneEpsilon: (epsilon) => inner.cloneEpsilon(epsilon),
    absDiffEq: (a, b, epsilon) => inner.absDiffEq(a.current, b.current, epsilon),
  });

  return defineRelativeEq(base, {
    defaultMaxRelative: () => inner.defaultMaxRelative(),
    relativeEq: (a, b, epsilon, maxRelative) => inner.relativeEq(a.current, b.current, epsilon, maxRelative),
  });
}
