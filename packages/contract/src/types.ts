/**
 * Approximate equality based on the absolute difference of two values.
 *
 * `E` is the tolerance ("epsilon") type. For IEEE floats it is `number`; for
 * composite values it is inherited from the contained value's comparator.
 *
 * `Rhs` defaults to `T`. A distinct right-hand side type is only used for the
 * wrapper/primitive pairs (e.g. `OrderedFloat` vs `number`).
 */
export interface AbsDiffEq<T, Rhs = T, E = number> {
  /** Tolerance used when the caller does not supply one. */
  defaultEpsilon(): E;

  /**
   * Duplicate a tolerance so it can be handed to more than one sub-comparison.
   *
   * Identity for immutable tolerances such as numbers.
   */
  cloneEpsilon(epsilon: E): E;

  absDiffEq(a: T, b: Rhs, epsilon: E): boolean;

  /** Always the negation of {@link AbsDiffEq.absDiffEq}. */
  absDiffNe(a: T, b: Rhs, epsilon: E): boolean;
}

/**
 * Approximate equality that falls back to a relative comparison when values
 * are far apart.
 *
 * This is a refinement of {@link AbsDiffEq}, not a replacement: every
 * `RelativeEq` is also an `AbsDiffEq` over the same tolerance type.
 */
export interface RelativeEq<T, Rhs = T, E = number> extends AbsDiffEq<T, Rhs, E> {
  /**
   * Relative tolerance used when the caller does not supply one.
   *
   * Machine epsilon for IEEE floats.
   */
  defaultMaxRelative(): E;

  relativeEq(a: T, b: Rhs, epsilon: E, maxRelative: E): boolean;

  /** Always the negation of {@link RelativeEq.relativeEq}. */
  relativeNe(a: T, b: Rhs, epsilon: E, maxRelative: E): boolean;
}
