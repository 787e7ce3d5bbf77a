import type { AbsDiffEq, RelativeEq } from "@approxeq/contract";

import { AbsDiff, Relative } from "./builders.js";
import { ApproxAssertionError } from "./errors.js";
import type { AssertionName } from "./errors.js";
import { formatApproxValue } from "./format.js";
import type { AbsDiffOptions, RelativeOptions } from "./options.js";

export type AssertMessage = {
  /** Prefixed to the failure report. */
  message?: string;
};

function failure(
  assertion: AssertionName,
  tolerances: { epsilon: unknown; maxRelative?: unknown },
  left: unknown,
  right: unknown,
  message: string | undefined,
): ApproxAssertionError {
  const tolText =
    "maxRelative" in tolerances
      ? `epsilon = ${formatApproxValue(tolerances.epsilon)}, maxRelative = ${formatApproxValue(tolerances.maxRelative)}`
      : `epsilon = ${formatApproxValue(tolerances.epsilon)}`;
  const head = `${assertion} failed (${tolText})`;

  const report = [
    message === undefined ? head : `${message}: ${head}`,
    `  left:  ${formatApproxValue(left)}`,
    `  right: ${formatApproxValue(right)}`,
  ].join("\n");

  return new ApproxAssertionError(report, { assertion, left, right, ...tolerances });
}

/** Throw {@link ApproxAssertionError} unless `a` and `b` are relatively equal. */
export function assertRelativeEq<T, Rhs, E>(
  cmp: RelativeEq<T, Rhs, E>,
  a: T,
  b: Rhs,
  opts: RelativeOptions<E> & AssertMessage = {},
): void {
  const rel = new Relative(cmp, opts);
  if (!rel.eq(a, b)) {
    throw failure("assertRelativeEq", rel.tolerances, a, b, opts.message);
  }
}

/** Throw {@link ApproxAssertionError} if `a` and `b` are relatively equal. */
export function assertRelativeNe<T, Rhs, E>(
  cmp: RelativeEq<T, Rhs, E>,
  a: T,
  b: Rhs,
  opts: RelativeOptions<E> & AssertMessage = {},
): void {
  const rel = new Relative(cmp, opts);
  if (!rel.ne(a, b)) {
    throw failure("assertRelativeNe", rel.tolerances, a, b, opts.message);
  }
}

/** Throw {@link ApproxAssertionError} unless `|a - b|` is within `epsilon`. */
export function assertAbsDiffEq<T, Rhs, E>(
  cmp: AbsDiffEq<T, Rhs, E>,
  a: T,
  b: Rhs,
  opts: AbsDiffOptions<E> & AssertMessage = {},
): void {
  const abs = new AbsDiff(cmp, opts);
  if (!abs.eq(a, b)) {
    throw failure("assertAbsDiffEq", { epsilon: abs.tolerance }, a, b, opts.message);
  }
}

/** Throw {@link ApproxAssertionError} if `|a - b|` is within `epsilon`. */
export function assertAbsDiffNe<T, Rhs, E>(
  cmp: AbsDiffEq<T, Rhs, E>,
  a: T,
  b: Rhs,
  opts: AbsDiffOptions<E> & AssertMessage = {},
): void {
  const abs = new AbsDiff(cmp, opts);
  if (!abs.ne(a, b)) {
    throw failure("assertAbsDiffNe", { epsilon: abs.tolerance }, a, b, opts.message);
  }
}
