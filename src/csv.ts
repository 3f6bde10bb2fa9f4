import type { CellValue, RawRow, RawTable } from "./types.js";

/**
 * Module: CSV Tables
 * Purpose: Read report CSV into a header-ordered `RawTable` (BOM stripped, short rows padded
 * with null, blank rows dropped) and write the long table back out.
 */

/**
 * Parse CSV text into array-of-arrays using a state machine that handles quoted fields,
 * escaped quotes and commas/newlines within quotes. A leading BOM is dropped.
 */
export function parseCsvRaw(csvText: string): string[][] {
  const text = csvText.charCodeAt(0) === 0xfeff ? csvText.slice(1) : csvText;
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    current.push(field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === `"`) {
        if (text[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else {
      if (c === `"`) {
        inQuotes = true;
      } else if (c === ",") {
        pushField();
      } else if (c === "\n") {
        pushField();
        pushRow();
      } else if (c === "\r") {
        // ignore CR
      } else {
        field += c;
      }
    }
  }
  pushField();
  pushRow();
  // Trim trailing blank rows
  while (rows.length && rows[rows.length - 1].every((v) => v === "")) rows.pop();
  return rows;
}

/**
 * Parse CSV text into a `RawTable`. The first row is the header; cells stay strings,
 * cells past the end of a short row become `null`. Purely blank rows are dropped.
 */
export function parseCsvToTable(csvText: string): RawTable {
  const raw = parseCsvRaw(csvText);
  const columns = raw[0]?.map((h) => String(h ?? "").trim()) ?? [];
  const rows: RawRow[] = [];
  for (let r = 1; r < raw.length; r++) {
    const rowVals = raw[r];
    if (rowVals.every((v) => v.trim() === "")) continue;
    const obj: RawRow = {};
    columns.forEach((h, idx) => {
      obj[h] = rowVals[idx] ?? null;
    });
    rows.push(obj);
  }
  return { columns, rows };
}

const formatCell = (v: CellValue | undefined): string => {
  if (v === undefined || v === null) return "";
  const s = String(v);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, `""`)}"` : s;
};

/**
 * Serialize a header + rows matrix to CSV text with `\n` line endings and a trailing newline.
 */
export function serializeCsv(matrix: ReadonlyArray<ReadonlyArray<CellValue>>): string {
  return matrix.map((row) => row.map(formatCell).join(",")).join("\n") + "\n";
}
