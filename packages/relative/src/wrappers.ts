import { formatNumber } from "@approxeq/core";

/** Thrown when a {@link NotNan} is constructed from NaN. */
export class FloatIsNanError extends Error {
  override name = "FloatIsNanError";

  constructor(message = "NotNan: value is NaN") {
    super(message);
  }
}

/** A float that is guaranteed not to be NaN. */
export class NotNan {
  readonly value: number;

  constructor(value: number) {
    if (Number.isNaN(value)) {
      throw new FloatIsNanError();
    }
    this.value = value;
  }

  /** Like the constructor, but returns `undefined` for NaN. */
  static tryFrom(value: number): NotNan | undefined {
    return Number.isNaN(value) ? undefined : new NotNan(value);
  }

  valueOf(): number {
    return this.value;
  }

  toString(): string {
    return `NotNan(${formatNumber(this.value)})`;
  }
}

/**
 * A float with a total order, for use as a sort or map key.
 *
 * Ordering: every NaN equals every other NaN and sorts above `+Infinity`;
 * `-0` and `+0` are equal. Everything else follows numeric order.
 *
 * The total order only affects {@link OrderedFloat.compareTo} and
 * {@link OrderedFloat.equals}; approximate comparisons still treat NaN as
 * unequal to everything.
 */
export class OrderedFloat {
  readonly value: number;

  constructor(value: number) {
    this.value = value;
  }

  static compare(a: OrderedFloat, b: OrderedFloat): -1 | 0 | 1 {
    return a.compareTo(b);
  }

  compareTo(other: OrderedFloat): -1 | 0 | 1 {
    const a = this.value;
    const b = other.value;
    const aNan = Number.isNaN(a);
    const bNan = Number.isNaN(b);

    if (aNan || bNan) {
      if (aNan && bNan) return 0;
      return aNan ? 1 : -1;
    }
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  equals(other: OrderedFloat): boolean {
    return this.compareTo(other) === 0;
  }

  valueOf(): number {
    return this.value;
  }

  toString(): string {
    return `OrderedFloat(${formatNumber(this.value)})`;
  }
}
