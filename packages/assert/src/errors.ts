export type AssertionName = "assertRelativeEq" | "assertRelativeNe" | "assertAbsDiffEq" | "assertAbsDiffNe";

/** Error thrown by the `assert*` helpers when a comparison does not hold. */
export class ApproxAssertionError extends Error {
  readonly assertion: AssertionName;
  readonly left: unknown;
  readonly right: unknown;
  readonly epsilon: unknown;
  /** `undefined` for the absolute-difference assertions. */
  readonly maxRelative: unknown;

  constructor(
    message: string,
    details: {
      assertion: AssertionName;
      left: unknown;
      right: unknown;
      epsilon: unknown;
      maxRelative?: unknown;
    },
  ) {
    super(message);
    this.name = "ApproxAssertionError";
    this.assertion = details.assertion;
    this.left = details.left;
    this.right = details.right;
    this.epsilon = details.epsilon;
    this.maxRelative = details.maxRelative;
  }
}
