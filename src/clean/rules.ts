/**
 * Cleaning rules applied to every pipeline's reshaped records.
 *
 * Order: projection & coercion, then the date window, then dedupe.
 */
import { SchemaViolationError } from "../core/exceptions.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { rangeColumn, type ColumnSchema, type Settings } from "../core/settings.js";
import type { CellValue, CleanReport, Row, Table } from "../core/types.js";
import { coerceValue, isMissing } from "./coerce.js";

export interface CleanResult {
  table: Table;
  report: CleanReport;
}

type Projected =
  | { kind: "row"; row: Row }
  | { kind: "incomplete"; column: string }
  | { kind: "rejected"; column: string; value: unknown };

/** First non-missing value among the column's sources, then its own name. */
function pick(record: Row, column: ColumnSchema): CellValue | undefined {
  for (const field of [...(column.source ?? []), column.name]) {
    const value = record[field];
    if (!isMissing(value)) return value;
  }
  return column.default !== undefined && !isMissing(column.default)
    ? column.default
    : undefined;
}

function project(record: Row, settings: Settings): Projected {
  const row: Row = {};
  for (const column of settings.schema) {
    const value = pick(record, column);
    if (value === undefined || value === null) {
      if (settings.mode === "strict" || column.mode === "REQUIRED") {
        return { kind: "incomplete", column: column.name };
      }
      row[column.name] = null;
      continue;
    }

    const coerced = coerceValue(value, column.type);
    if (!coerced.ok) {
      if (settings.mode === "strict") {
        throw new SchemaViolationError(column.name, value, column.type);
      }
      return { kind: "rejected", column: column.name, value };
    }
    row[column.name] = coerced.value;
  }
  return { kind: "row", row };
}

function inWindow(value: CellValue, from: string, to: string): boolean {
  if (typeof value !== "string") return false;
  const day = value.slice(0, 10);
  return day >= from && day <= to;
}

/**
 * Collapse rows sharing a key. The latest row wins and takes the position of
 * the first one, so a second pass changes nothing.
 */
export function dedupe(rows: Row[], keyColumns: string[]): { rows: Row[]; duplicates: number } {
  const out: Row[] = [];
  const index = new Map<string, number>();
  let duplicates = 0;
  for (const row of rows) {
    const key = JSON.stringify(keyColumns.map((c) => row[c] ?? null));
    const at = index.get(key);
    if (at === undefined) {
      index.set(key, out.length);
      out.push(row);
    } else {
      out[at] = row;
      duplicates++;
    }
  }
  return { rows: out, duplicates };
}

/**
 * Project `records` onto the declared schema and apply the cleaning rules.
 * @throws SchemaViolationError in strict mode, on the first value that does not coerce.
 */
export function cleanRecords(
  records: Row[],
  settings: Settings,
  log: Logger = silentLogger,
): CleanResult {
  const report: CleanReport = {
    input: records.length,
    output: 0,
    incomplete: 0,
    rejected: 0,
    outOfRange: 0,
    duplicates: 0,
  };

  let rows: Row[] = [];
  records.forEach((record, i) => {
    const projected = project(record, settings);
    switch (projected.kind) {
      case "row":
        rows.push(projected.row);
        break;
      case "incomplete":
        report.incomplete++;
        break;
      case "rejected":
        report.rejected++;
        log.warn(
          `record ${i}: ${JSON.stringify(projected.value)} is not a valid value for "${projected.column}", dropped`,
        );
        break;
    }
  });

  const range = settings.validRange;
  const column = rangeColumn(settings);
  if (range && column) {
    const before = rows.length;
    rows = rows.filter((row) => inWindow(row[column.name] ?? null, range.from, range.to));
    report.outOfRange = before - rows.length;
  }

  const keyColumns =
    settings.primaryKey.length > 0
      ? settings.primaryKey
      : settings.schema.map((c) => c.name);
  const deduped = dedupe(rows, keyColumns);
  report.duplicates = deduped.duplicates;
  report.output = deduped.rows.length;

  return {
    table: { columns: settings.schema.map((c) => c.name), rows: deduped.rows },
    report,
  };
}
