/**
 * Fitbit - Record tables and merge
 *
 * Full outer join of every normalized resource on (device, date), split
 * into complete rows (a sleep log exists for that date) and incomplete rows.
 */

import { setupLogger } from "../../lib/logger.js";
import { DATE_COLUMN, DEVICE_COLUMN, type CellValue, type NormalizedRecord } from "./types.js";

const logger = setupLogger("fitbit-merge");

/** Sleep log id column; its presence marks a row complete */
export const LOG_ID_COLUMN = "logId";

export type Row = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: Row[];
}

export interface CombinedRow {
  deviceId: string;
  date: string;
  fields: Row;
  complete: boolean;
}

export interface MergeResult {
  columns: string[];
  joined: CombinedRow[];
  complete: Table;
  incomplete: Table;
}

function addColumns(columns: string[], seen: Set<string>, names: Iterable<string>): void {
  for (const name of names) {
    if (!seen.has(name)) {
      seen.add(name);
      columns.push(name);
    }
  }
}

/**
 * Flatten records into a table with device and date leading.
 * Columns are ordered by first appearance.
 */
export function recordsToTable(records: readonly NormalizedRecord[]): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  addColumns(columns, seen, [DEVICE_COLUMN, DATE_COLUMN]);

  const rows = records.map((record): Row => {
    addColumns(columns, seen, Object.keys(record.fields));
    return { [DEVICE_COLUMN]: record.deviceId, [DATE_COLUMN]: record.date, ...record.fields };
  });

  return { columns: records.length > 0 ? columns : [], rows };
}

function toTable(columns: string[], rows: readonly CombinedRow[]): Table {
  return {
    columns,
    rows: rows.map((row) => {
      const out: Row = {};
      for (const column of columns) {
        if (column === DEVICE_COLUMN) out[column] = row.deviceId;
        else if (column === DATE_COLUMN) out[column] = row.date;
        else out[column] = row.fields[column] ?? null;
      }
      return out;
    }),
  };
}

/**
 * Outer-join record sets on (device, date).
 *
 * Rows keep first-seen order across the sets in the given order. Later
 * sets overwrite same-named fields. Returns null when every set is empty.
 */
export function combine(recordSets: readonly (readonly NormalizedRecord[])[]): MergeResult | null {
  const nonEmpty = recordSets.filter((records) => records.length > 0);
  if (nonEmpty.length === 0) {
    logger.error("No data available to merge.");
    return null;
  }

  logger.info(`Joining ${nonEmpty.length} data tables...`);

  const columns: string[] = [];
  const seen = new Set<string>();
  addColumns(columns, seen, [DEVICE_COLUMN, DATE_COLUMN]);

  const byKey = new Map<string, CombinedRow>();
  for (const records of nonEmpty) {
    for (const record of records) {
      addColumns(columns, seen, Object.keys(record.fields));
      const key = JSON.stringify([record.deviceId, record.date]);
      const existing = byKey.get(key);
      if (existing) {
        Object.assign(existing.fields, record.fields);
      } else {
        byKey.set(key, {
          deviceId: record.deviceId,
          date: record.date,
          fields: { ...record.fields },
          complete: false,
        });
      }
    }
  }

  addColumns(columns, seen, [LOG_ID_COLUMN]);

  const joined = [...byKey.values()];
  for (const row of joined) {
    row.complete = (row.fields[LOG_ID_COLUMN] ?? null) !== null;
  }

  const complete = joined.filter((row) => row.complete);
  const incomplete = joined.filter((row) => !row.complete);
  logger.info(`Merged ${joined.length} rows: ${complete.length} complete, ${incomplete.length} incomplete`);

  return {
    columns,
    joined,
    complete: toTable(columns, complete),
    incomplete: toTable(columns, incomplete),
  };
}
