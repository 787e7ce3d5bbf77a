export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
* Assert that a condition is truthy.
*
* Throws {@link InvariantError} when the assertion fails.
*/
export function invariant(condition: unknown, message = "Invariant violation"): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
* Exhaustiveness helper for `switch` statements.
*
* Throws an error if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}

/**
* Render a number for diagnostics.
*
* Unlike `String(x)`, negative zero keeps its sign (`"-0"`), so reports can tell
* `+0` and `-0` apart.
*/
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) return "-0";
  return String(value);
}
