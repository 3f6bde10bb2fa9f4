import * as XLSX from "xlsx";
import type { CellValue, RawRow, RawTable } from "./types.js";

export const REPORT_SHEET_NAME = "Report";

/**
 * Read an Excel workbook from bytes and return the main sheet as a `RawTable`.
 * - Chooses the main sheet (prefers `Report`, otherwise the first sheet).
 * - The first non-blank row is the header; cells are read raw, so date cells arrive as
 *   Excel serial numbers and are resolved by the date repair pass.
 */
export function readXlsxToTable(fileBytes: ArrayBuffer | Uint8Array): RawTable {
  const data = fileBytes instanceof Uint8Array ? fileBytes : new Uint8Array(fileBytes);
  const workbook = XLSX.read(data, { type: "array" });

  const sheetName = chooseMainSheet(workbook.SheetNames);
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) return { columns: [], rows: [] };

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });
  const [header, ...body] = matrix;
  const columns = (header ?? []).map((h) => String(h ?? "").trim());
  const rows: RawRow[] = body.map((cells) => {
    const out: RawRow = {};
    columns.forEach((col, idx) => {
      out[col] = toCellValue(cells[idx]);
    });
    return out;
  });
  return { columns, rows };
}

/**
 * Build an `.xlsx` workbook with a single `Report` sheet from a header + rows matrix.
 */
export function writeXlsxFromMatrix(matrix: ReadonlyArray<ReadonlyArray<CellValue>>): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet(matrix.map((row) => [...row]));
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, REPORT_SHEET_NAME);
  const out: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return out;
}

function chooseMainSheet(sheetNames: string[]): string | undefined {
  const preferred = sheetNames.find((name) => name.toLowerCase() === REPORT_SHEET_NAME.toLowerCase());
  return preferred ?? sheetNames[0];
}

function toCellValue(v: unknown): CellValue {
  if (v === undefined || v === null) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString();
  return String(v);
}
