import { ApproxContractError } from "./errors.js";
import type { AbsDiffEq, RelativeEq } from "./types.js";

export type AbsDiffEqImpl<T, Rhs = T, E = number> = {
  readonly defaultEpsilon: () => E;
  readonly absDiffEq: (a: T, b: Rhs, epsilon: E) => boolean;
  /** Defaults to identity. Supply one when `E` is a mutable structure. */
  readonly cloneEpsilon?: (epsilon: E) => E;
  /** Derived; implementations never provide it. */
  readonly absDiffNe?: never;
};

export type RelativeEqImpl<T, Rhs = T, E = number> = {
  readonly defaultMaxRelative: () => E;
  readonly relativeEq: (a: T, b: Rhs, epsilon: E, maxRelative: E) => boolean;
  /** Derived; implementations never provide it. */
  readonly relativeNe?: never;
};

function rejectOwnKey(impl: object, key: string, label: string): void {
  if (Object.prototype.hasOwnProperty.call(impl, key)) {
    throw new ApproxContractError(`${label}: \`${key}\` is derived from the equality test and cannot be overridden`);
  }
}

function identity<E>(epsilon: E): E {
  return epsilon;
}

/**
 * Build an {@link AbsDiffEq} comparator.
 *
 * `absDiffNe` is always derived as the negation of `absDiffEq`.
 */
export function defineAbsDiffEq<T, Rhs = T, E = number>(impl: AbsDiffEqImpl<T, Rhs, E>): AbsDiffEq<T, Rhs, E> {
  rejectOwnKey(impl, "absDiffNe", "defineAbsDiffEq()");

  const { defaultEpsilon, absDiffEq } = impl;
  const cloneEpsilon: (epsilon: E) => E = impl.cloneEpsilon ?? identity;

  return Object.freeze({
    defaultEpsilon: () => defaultEpsilon(),
    cloneEpsilon: (epsilon: E) => cloneEpsilon(epsilon),
    absDiffEq: (a: T, b: Rhs, epsilon: E) => absDiffEq(a, b, epsilon),
    absDiffNe: (a: T, b: Rhs, epsilon: E) => !absDiffEq(a, b, epsilon),
  });
}

/**
 * Build a {@link RelativeEq} comparator on top of an existing {@link AbsDiffEq}.
 *
 * The absolute-difference half (`defaultEpsilon`, `cloneEpsilon`, `absDiffEq`)
 * is delegated to `base`. `relativeNe` is always derived as the negation of
 * `relativeEq`, so `relativeEq(a, b, ...) !== relativeNe(a, b, ...)` holds for
 * every input.
 */
export function defineRelativeEq<T, Rhs = T, E = number>(
  base: AbsDiffEq<T, Rhs, E>,
  impl: RelativeEqImpl<T, Rhs, E>,
): RelativeEq<T, Rhs, E> {
  rejectOwnKey(impl, "relativeNe", "defineRelativeEq()");

  const { defaultMaxRelative, relativeEq } = impl;

  return Object.freeze({
    defaultEpsilon: () => base.defaultEpsilon(),
    cloneEpsilon: (epsilon: E) => base.cloneEpsilon(epsilon),
    absDiffEq: (a: T, b: Rhs, epsilon: E) => base.absDiffEq(a, b, epsilon),
    absDiffNe: (a: T, b: Rhs, epsilon: E) => base.absDiffNe(a, b, epsilon),
    defaultMaxRelative: () => defaultMaxRelative(),
    relativeEq: (a: T, b: Rhs, epsilon: E, maxRelative: E) => relativeEq(a, b, epsilon, maxRelative),
    relativeNe: (a: T, b: Rhs, epsilon: E, maxRelative: E) => !relativeEq(a, b, epsilon, maxRelative),
  });
}
