export { floatAbsDiffEq } from "./absDiff.js";
export { f32, f64, floatRelativeEq } from "./float.js";

export { BorrowError, BorrowMutError, Cell, RefCell } from "./cell.js";
export type { BorrowState, RefGuard, RefMutGuard } from "./cell.js";

export { complex } from "./complex.js";
export type { Complex } from "./complex.js";

export { FloatIsNanError, NotNan, OrderedFloat } from "./wrappers.js";

export { refOf } from "./compose/ref.js";
export type { Ref } from "./compose/ref.js";
export { cellOf } from "./compose/cell.js";
export { refCellOf } from "./compose/refCell.js";
export { sliceOf } from "./compose/slice.js";
export { complexOf } from "./compose/complex.js";
export {
  floatVsNotNan,
  floatVsOrderedFloat,
  notNanOf,
  notNanVsFloat,
  orderedFloatOf,
  orderedFloatVsFloat,
} from "./compose/wrappers.js";
