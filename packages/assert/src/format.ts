import { formatNumber } from "@approxeq/core";
import { Cell, RefCell } from "@approxeq/relative";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  if (Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isNumericView(value: unknown): value is ArrayLike<number | bigint> {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function formatInner(value: unknown, seen: WeakSet<object>): string {
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "bigint") return `${value.toString()}n`;
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value !== "object" || value === null) return String(value);

  if (seen.has(value)) return "[Circular]";
  seen.add(value);
  try {
    if (value instanceof Cell) {
      return `Cell(${formatInner(value.get(), seen)})`;
    }

    if (value instanceof RefCell) {
      // Never throw while building a report; a writer may hold the cell.
      const guard = value.tryBorrow();
      if (guard === undefined) return "RefCell(<mutably borrowed>)";
      try {
        return `RefCell(${formatInner(guard.value, seen)})`;
      } finally {
        guard.release();
      }
    }

    if (Array.isArray(value)) {
      return `[${value.map((v) => formatInner(v, seen)).join(", ")}]`;
    }

    if (isNumericView(value)) {
      return `${value.constructor.name}[${Array.from(value, (v) => formatInner(v, seen)).join(", ")}]`;
    }

    if (isPlainObject(value)) {
      const entries = Object.keys(value).map((k) => `${k}: ${formatInner(value[k], seen)}`);
      return entries.length === 0 ? "{}" : `{ ${entries.join(", ")} }`;
    }

    return String(value);
  } finally {
    seen.delete(value);
  }
}

/**
 * Render an operand or tolerance for assertion messages.
 *
 * Numbers keep `-0`, `NaN` and `Infinity`; arrays, typed arrays, plain objects
 * and cells show their contents; other objects use their own `toString()`.
 */
export function formatApproxValue(value: unknown): string {
  return formatInner(value, new WeakSet());
}
