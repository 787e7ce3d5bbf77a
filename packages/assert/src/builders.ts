import type { AbsDiffEq, RelativeEq } from "@approxeq/contract";

import { checkTolerance, resolveOnWarning } from "./options.js";
import type { AbsDiffOptions, RelativeOptions } from "./options.js";

export type RelativeTolerances<E> = { readonly epsilon: E; readonly maxRelative: E };

/**
 * Relative comparison with tolerances filled in from the comparator's defaults.
 *
 * Builders are immutable: `epsilon()` and `maxRelative()` return a new builder.
 *
 * ```ts
 * new Relative(f64).maxRelative(0.34).eq(1.0, 1.5); // true
 * ```
 */
export class Relative<T, Rhs = T, E = number> {
  readonly #cmp: RelativeEq<T, Rhs, E>;
  readonly #opts: RelativeOptions<E>;

  constructor(cmp: RelativeEq<T, Rhs, E>, opts: RelativeOptions<E> = {}) {
    this.#cmp = cmp;
    this.#opts = opts;
  }

  epsilon(epsilon: E): Relative<T, Rhs, E> {
    return new Relative(this.#cmp, { ...this.#opts, epsilon });
  }

  maxRelative(maxRelative: E): Relative<T, Rhs, E> {
    return new Relative(this.#cmp, { ...this.#opts, maxRelative });
  }

  /** The tolerances `eq`/`ne` will use. */
  get tolerances(): RelativeTolerances<E> {
    return {
      epsilon: this.#opts.epsilon ?? this.#cmp.defaultEpsilon(),
      maxRelative: this.#opts.maxRelative ?? this.#cmp.defaultMaxRelative(),
    };
  }

  eq(a: T, b: Rhs): boolean {
    const { epsilon, maxRelative } = this.#checked("Relative.eq()");
    return this.#cmp.relativeEq(a, b, epsilon, maxRelative);
  }

  ne(a: T, b: Rhs): boolean {
    const { epsilon, maxRelative } = this.#checked("Relative.ne()");
    return this.#cmp.relativeNe(a, b, epsilon, maxRelative);
  }

  #checked(label: string): RelativeTolerances<E> {
    const tolerances = this.tolerances;
    const onWarning = resolveOnWarning(this.#opts);
    checkTolerance(label, "epsilon", tolerances.epsilon, onWarning);
    checkTolerance(label, "maxRelative", tolerances.maxRelative, onWarning);
    return tolerances;
  }
}

/** Absolute-difference comparison with the tolerance filled in from the comparator's default. */
export class AbsDiff<T, Rhs = T, E = number> {
  readonly #cmp: AbsDiffEq<T, Rhs, E>;
  readonly #opts: AbsDiffOptions<E>;

  constructor(cmp: AbsDiffEq<T, Rhs, E>, opts: AbsDiffOptions<E> = {}) {
    this.#cmp = cmp;
    this.#opts = opts;
  }

  epsilon(epsilon: E): AbsDiff<T, Rhs, E> {
    return new AbsDiff(this.#cmp, { ...this.#opts, epsilon });
  }

  get tolerance(): E {
    return this.#opts.epsilon ?? this.#cmp.defaultEpsilon();
  }

  eq(a: T, b: Rhs): boolean {
    return this.#cmp.absDiffEq(a, b, this.#checked("AbsDiff.eq()"));
  }

  ne(a: T, b: Rhs): boolean {
    return this.#cmp.absDiffNe(a, b, this.#checked("AbsDiff.ne()"));
  }

  #checked(label: string): E {
    const epsilon = this.tolerance;
    checkTolerance(label, "epsilon", epsilon, resolveOnWarning(this.#opts));
    return epsilon;
  }
}

export function relativeEq<T, Rhs, E>(
  cmp: RelativeEq<T, Rhs, E>,
  a: T,
  b: Rhs,
  opts?: RelativeOptions<E>,
): boolean {
  return new Relative(cmp, opts).eq(a, b);
}

export function relativeNe<T, Rhs, E>(
  cmp: RelativeEq<T, Rhs, E>,
  a: T,
  b: Rhs,
  opts?: RelativeOptions<E>,
): boolean {
  return new Relative(cmp, opts).ne(a, b);
}

export function absDiffEq<T, Rhs, E>(cmp: AbsDiffEq<T, Rhs, E>, a: T, b: Rhs, opts?: AbsDiffOptions<E>): boolean {
  return new AbsDiff(cmp, opts).eq(a, b);
}

export function absDiffNe<T, Rhs, E>(cmp: AbsDiffEq<T, Rhs, E>, a: T, b: Rhs, opts?: AbsDiffOptions<E>): boolean {
  return new AbsDiff(cmp, opts).ne(a, b);
}
