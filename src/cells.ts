import type { CellValue, TaggedCell } from "./types.js";

// Plain decimal literal with optional thousands separators and exponent
const NUMERIC_RE = /^[-+]?(?:(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

/** `null`, `undefined`, `NaN` and blank strings are missing. */
export function isMissing(v: CellValue | undefined): boolean {
  if (v === undefined || v === null) return true;
  if (typeof v === "number") return Number.isNaN(v);
  if (typeof v === "string") return v.trim() === "";
  return false;
}

/**
 * Coerce a cell to a finite number, or `undefined` when it is missing or not numeric.
 */
export function coerceNumber(v: CellValue | undefined): number | undefined {
  if (isMissing(v)) return undefined;
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  if (!NUMERIC_RE.test(s)) return undefined;
  const n = Number(s.replace(/,/g, ""));
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Tag a cell as text or number. Missing cells have no tag.
 */
export function classifyCell(v: CellValue | undefined): TaggedCell | undefined {
  if (isMissing(v)) return undefined;
  const n = coerceNumber(v);
  if (n !== undefined) return { kind: "number", value: n };
  return { kind: "text", value: String(v).trim() };
}
