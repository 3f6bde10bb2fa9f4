import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parseCsvToTable } from "./csv.js";
import { InputNotFoundError, UnsupportedFormatError } from "./errors.js";
import type { RawTable } from "./types.js";
import { readXlsxToTable } from "./xlsx.js";

export const READABLE_EXTENSIONS = [".csv", ".xlsx", ".xls"] as const;

/**
 * Decode file bytes into a `RawTable`, choosing the reader by filename:
 * `.xlsx`/`.xls` through the workbook reader, `.csv` through the CSV state machine.
 */
export function readTableFromBuffer(fileBytes: ArrayBuffer | Uint8Array, filename: string): RawTable {
  const ext = extname(filename).toLowerCase();
  if (ext === ".xlsx" || ext === ".xls") return readXlsxToTable(fileBytes);
  if (ext === ".csv") return parseCsvToTable(new TextDecoder("utf-8").decode(fileBytes));
  throw new UnsupportedFormatError(filename, READABLE_EXTENSIONS);
}

/**
 * Read a table from disk. A path that does not resolve raises `InputNotFoundError`.
 */
export async function readTableFile(path: string): Promise<RawTable> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT") || isErrnoCode(error, "ENOTDIR") || isErrnoCode(error, "EISDIR")) {
      throw new InputNotFoundError(path);
    }
    throw error;
  }
  return readTableFromBuffer(bytes, path);
}

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}
