import { classifyCell, isMissing } from "./cells.js";
import { listGroupColumns } from "./schema.js";
import {
  GROUP_FIELDS,
  REQUIRED_COLUMNS,
  type RawRow,
  type RawTable,
  type UnpivotStrategy,
} from "./types.js";

/**
 * Module: Wide → Long Unpivot
 * Purpose: Rebuild repeating (region, regional_sales, product_id) groups from the ordered
 * `col_*` cells of each wide row.
 * Design:
 * - `adaptive` (default) anchors on cell content: a text cell opens a group, numbers fill it.
 *   Blank cells hold their slot, so a blank sales cell still routes the next number to
 *   `product_id`; dropped cells simply shift and are filled in order.
 * - `triplet` is the legacy fixed-offset reader kept for layouts known to be regular.
 * - Each row folds to its own list of records; nothing carries across rows.
 */

export interface UnpivotOptions {
  groupPrefix: string;
  strategy: UnpivotStrategy;
  keepBareRegions: boolean;
}

interface GroupAccumulator {
  region: string;
  regional_sales?: number;
  product_id?: number;
  // Cells seen since the region cell, blanks included
  offset: number;
}

const LONG_COLUMNS: string[] = [...REQUIRED_COLUMNS, ...GROUP_FIELDS];

function identifyingFields(row: RawRow): RawRow {
  const base: RawRow = {};
  for (const col of REQUIRED_COLUMNS) base[col] = row[col] ?? null;
  return base;
}

function flushGroup(base: RawRow, acc: GroupAccumulator, keepBareRegions: boolean): RawRow | undefined {
  const bare = acc.regional_sales === undefined && acc.product_id === undefined;
  if (bare && !keepBareRegions) return undefined;
  const record: RawRow = { ...base, region: acc.region };
  if (acc.regional_sales !== undefined) record.regional_sales = acc.regional_sales;
  if (acc.product_id !== undefined) record.product_id = acc.product_id;
  return record;
}

function assignNumber(acc: GroupAccumulator, value: number): void {
  if (acc.offset === 1 && acc.regional_sales === undefined) {
    acc.regional_sales = value;
    return;
  }
  if (acc.offset === 2 && acc.product_id === undefined) {
    acc.product_id = value;
    return;
  }
  if (acc.regional_sales === undefined) acc.regional_sales = value;
  else if (acc.product_id === undefined) acc.product_id = value;
  // else: surplus number in a complete group
}

/**
 * Reconstruct the long records of one wide row with a single left-to-right scan.
 *
 * Behavior:
 * - Numbers before the first region are ignored.
 * - A text cell flushes the held group (bare regions included unless `keepBareRegions`
 *   is false) and opens a new one.
 * - A held group is flushed after the last cell.
 * - Unassigned `regional_sales` / `product_id` are left absent for the defaulting pass.
 */
export function unpivotRowAdaptive(
  row: RawRow,
  groupColumns: readonly string[],
  keepBareRegions = true
): RawRow[] {
  const base = identifyingFields(row);
  const records: RawRow[] = [];
  let acc: GroupAccumulator | undefined;

  const flush = () => {
    if (!acc) return;
    const record = flushGroup(base, acc, keepBareRegions);
    if (record) records.push(record);
    acc = undefined;
  };

  for (const col of groupColumns) {
    if (acc) acc.offset++;
    const cell = classifyCell(row[col]);
    if (!cell) continue;
    if (cell.kind === "text") {
      flush();
      acc = { region: cell.value, offset: 0 };
      continue;
    }
    if (acc) assignNumber(acc, cell.value);
  }
  flush();
  return records;
}

/**
 * Legacy reader: group columns three at a time, a triplet only when all three columns
 * exist, and a record only when its first cell is present. Cells are copied verbatim.
 */
export function unpivotRowTriplets(row: RawRow, groupColumns: readonly string[]): RawRow[] {
  const base = identifyingFields(row);
  const records: RawRow[] = [];
  for (let i = 0; i + 2 < groupColumns.length; i += 3) {
    const region = row[groupColumns[i]];
    if (isMissing(region)) continue;
    records.push({
      ...base,
      region: region ?? null,
      regional_sales: row[groupColumns[i + 1]] ?? null,
      product_id: row[groupColumns[i + 2]] ?? null,
    });
  }
  return records;
}

export function unpivotRow(row: RawRow, groupColumns: readonly string[], options: UnpivotOptions): RawRow[] {
  return options.strategy === "triplet"
    ? unpivotRowTriplets(row, groupColumns)
    : unpivotRowAdaptive(row, groupColumns, options.keepBareRegions);
}

/**
 * Unpivot a wide table into long format, preserving row order and, within a row,
 * group-discovery order. Rows yielding no group contribute nothing.
 */
export function unpivotTable(table: RawTable, options: UnpivotOptions): RawTable {
  const groupColumns = listGroupColumns(table.columns, options.groupPrefix);
  const rows = table.rows.flatMap((row) => unpivotRow(row, groupColumns, options));
  return { columns: [...LONG_COLUMNS], rows };
}
