import { describe, expect, test } from "vitest";
import { parseCsvRaw, parseCsvToTable, serializeCsv } from "./csv.js";

describe("parseCsvRaw", () => {
  test("handles quoted commas, escaped quotes and CRLF", () => {
    const rows = parseCsvRaw('a,b\r\n"x, y","he said ""hi"""\r\n');
    expect(rows).toEqual([
      ["a", "b"],
      ["x, y", 'he said "hi"'],
    ]);
  });

  test("keeps newlines inside quoted fields", () => {
    expect(parseCsvRaw('a\n"line1\nline2"\n')).toEqual([["a"], ["line1\nline2"]]);
  });
});

describe("parseCsvToTable", () => {
  test("maps rows by header and pads short rows with null", () => {
    const table = parseCsvToTable("date,col_1\n2024-01-01,East\n2024-01-02\n");
    expect(table.columns).toEqual(["date", "col_1"]);
    expect(table.rows).toEqual([
      { date: "2024-01-01", col_1: "East" },
      { date: "2024-01-02", col_1: null },
    ]);
  });

  test("drops blank rows and a leading BOM", () => {
    const table = parseCsvToTable("\uFEFFa,b\n1,2\n,\n3,4\n");
    expect(table.columns).toEqual(["a", "b"]);
    expect(table.rows).toEqual([
      { a: "1", b: "2" },
      { a: "3", b: "4" },
    ]);
  });

  test("returns an empty table for empty text", () => {
    expect(parseCsvToTable("")).toEqual({ columns: [], rows: [] });
  });
});

describe("serializeCsv", () => {
  test("quotes only when needed and writes null as empty", () => {
    const text = serializeCsv([
      ["a", "b"],
      ["x, y", null],
      [1, 'q"t'],
    ]);
    expect(text).toBe('a,b\n"x, y",\n1,"q""t"\n');
  });
});
