import { mkdir, writeFile } from "node:fs/promises";
import { dirname, extname } from "node:path";
import { serializeCsv } from "./csv.js";
import { UnsupportedFormatError } from "./errors.js";
import { OUTPUT_COLUMNS, type CellValue, type LongRecord } from "./types.js";
import { writeXlsxFromMatrix } from "./xlsx.js";

export const WRITABLE_EXTENSIONS = [".csv", ".xlsx"] as const;

/**
 * Header + rows in the fixed output order, whatever order the records were built in.
 * Downstream consumers rely on this order.
 */
export function toOutputMatrix(records: readonly LongRecord[]): CellValue[][] {
  const header: CellValue[] = [...OUTPUT_COLUMNS];
  return [header, ...records.map((r) => OUTPUT_COLUMNS.map((col): CellValue => r[col]))];
}

export function recordsToCsv(records: readonly LongRecord[]): string {
  return serializeCsv(toOutputMatrix(records));
}

/**
 * Persist records as CSV or XLSX (by extension), creating the parent directory.
 */
export async function writeResultFile(path: string, records: readonly LongRecord[]): Promise<void> {
  const ext = extname(path).toLowerCase();
  let body: string | Buffer;
  if (ext === ".csv") body = recordsToCsv(records);
  else if (ext === ".xlsx") body = writeXlsxFromMatrix(toOutputMatrix(records));
  else throw new UnsupportedFormatError(path, WRITABLE_EXTENSIONS);

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, body);
}
