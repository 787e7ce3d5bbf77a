/** Set to `1` to drop warnings that would otherwise go to `console.warn`. */
export const SILENCE_WARNINGS_ENV = "APPROXEQ_SILENCE_WARNINGS";

export type ApproxOptions = {
  /**
   * Warning hook for suspicious (but legal) tolerances, such as a negative or
   * NaN `maxRelative`.
   *
   * When not provided, warnings fall back to `console.warn` (if available),
   * unless `APPROXEQ_SILENCE_WARNINGS=1` is set.
   */
  onWarning?: (message: string) => void;
};

export type AbsDiffOptions<E> = ApproxOptions & {
  /** Absolute tolerance. Defaults to the comparator's `defaultEpsilon()`. */
  epsilon?: E;
};

export type RelativeOptions<E> = AbsDiffOptions<E> & {
  /** Relative tolerance. Defaults to the comparator's `defaultMaxRelative()`. */
  maxRelative?: E;
};

function warningsSilenced(): boolean {
  // Safe in non-node runtimes.
  return typeof process !== "undefined" && process?.env?.[SILENCE_WARNINGS_ENV] === "1";
}

const defaultOnWarning = (message: string): void => {
  if (warningsSilenced()) return;
  if (typeof console !== "undefined" && typeof console.warn === "function") {
    console.warn(message);
  }
};

export function resolveOnWarning(opts: ApproxOptions | undefined): (message: string) => void {
  return opts?.onWarning ?? defaultOnWarning;
}

/**
 * Report numeric tolerances that make a comparison degenerate.
 *
 * A negative tolerance can never be met, and a NaN tolerance fails every
 * comparison; neither is an error, but both are almost always a bug at the call
 * site. Non-numeric tolerance types are not inspected.
 */
export function checkTolerance(
  label: string,
  name: "epsilon" | "maxRelative",
  value: unknown,
  onWarning: (message: string) => void,
): void {
  if (typeof value !== "number") return;

  if (Number.isNaN(value)) {
    onWarning(`${label}: ${name} is NaN; every comparison will fail`);
  } else if (value < 0) {
    onWarning(`${label}: ${name} is negative (${value}); it can never be satisfied`);
  }
}
