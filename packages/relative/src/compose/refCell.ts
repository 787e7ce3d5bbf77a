import { defineAbsDiffEq, defineRelativeEq } from "@approxeq/contract";
import type { RelativeEq } from "@approxeq/contract";

import type { RefCell } from "../cell.js";

// Both shared borrows are held for the duration of `fn` and released even if it
// throws. A cell that is mutably borrowed makes `borrow()` throw BorrowError.
function withBothBorrowed<T, Rhs, R>(a: RefCell<T>, b: RefCell<Rhs>, fn: (a: T, b: Rhs) => R): R {
  const left = a.borrow();
  try {
    const right = b.borrow();
    try {
      return fn(left.value, right.value);
    } finally {
      right.release();
    }
  } finally {
    left.release();
  }
}

/**
 * Compare two {@link RefCell}s by their current values.
 *
 * Throws `BorrowError` if either cell is mutably borrowed at the time of the
 * comparison.
 */
export function refCellOf<T, Rhs = T, E = number>(
  inner: RelativeEq<T, Rhs, E>,
): RelativeEq<RefCell<T>, RefCell<Rhs>, E> {
  const base = defineAbsDiffEq<RefCell<T>, RefCell<Rhs>, E>({
    defaultEpsilon: () => inner.defaultEpsilon(),
    cloneEpsilon: (epsilon) => inner.cloneEpsilon(epsilon),
    absDiffEq: (a, b, epsilon) => withBothBorrowed(a, b, (x, y) => inner.absDiffEq(x, y, epsilon)),
  });

  return defineRelativeEq(base, {
    defaultMaxRelative: () => inner.defaultMaxRelative(),
    relativeEq: (a, b, epsilon, maxRelative) =>
      withBothBorrowed(a, b, (x, y) => inner.relativeEq(x, y, epsilon, maxRelative)),
  });
}
