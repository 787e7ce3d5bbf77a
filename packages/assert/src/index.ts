export { AbsDiff, absDiffEq, absDiffNe, Relative, relativeEq, relativeNe } from "./builders.js";
export type { RelativeTolerances } from "./builders.js";

export { assertAbsDiffEq, assertAbsDiffNe, assertRelativeEq, assertRelativeNe } from "./assert.js";
export type { AssertMessage } from "./assert.js";

export { ApproxAssertionError } from "./errors.js";
export type { AssertionName } from "./errors.js";

export { formatApproxValue } from "./format.js";

export { SILENCE_WARNINGS_ENV } from "./options.js";
export type { AbsDiffOptions, ApproxOptions, RelativeOptions } from "./options.js";
