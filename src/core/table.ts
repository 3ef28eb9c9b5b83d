/**
 * Tabular snapshot helpers: building tables from records, flattening nested
 * JSON, and CSV encoding through SheetJS.
 */
import * as XLSX from "xlsx";

import type { CellValue, Row, Table } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Narrow an arbitrary value to a cell, stringifying anything structured. */
export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

/**
 * Flatten nested objects into dotted column names (`temp.min`). Arrays are
 * kept whole as JSON text.
 */
export function flattenRecord(
  value: Record<string, unknown>,
  prefix = "",
  out: Row = {},
): Row {
  for (const [key, v] of Object.entries(value)) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (isRecord(v) && !(v instanceof Date)) {
      flattenRecord(v, name, out);
    } else {
      out[name] = toCell(v);
    }
  }
  return out;
}

/**
 * Build a rectangular table. Columns are ordered by first appearance and
 * absent cells become null.
 */
export function tableFromRows(rows: Row[], columns?: string[]): Table {
  const order = columns ? [...columns] : [];
  if (!columns) {
    const seen = new Set<string>();
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          seen.add(key);
          order.push(key);
        }
      }
    }
  }

  const rectangular = rows.map((row) => {
    const out: Row = {};
    for (const col of order) out[col] = row[col] ?? null;
    return out;
  });
  return { columns: order, rows: rectangular };
}

// ---------------------------------------------------------------------------
// CSV
// ---------------------------------------------------------------------------

export function encodeCsv(table: Table): string {
  const sheet = XLSX.utils.json_to_sheet(table.rows, { header: table.columns });
  return XLSX.utils.sheet_to_csv(sheet);
}

/**
 * SheetJS takes text starting with `ID` for SYLK. Quoting the first field
 * keeps such a file CSV.
 */
function quoteLeadingId(text: string): string {
  if (!text.startsWith("ID")) return text;
  const end = text.search(/[,\r\n]/);
  const first = end === -1 ? text : text.slice(0, end);
  const rest = end === -1 ? "" : text.slice(end);
  return `"${first.replaceAll('"', '""')}"${rest}`;
}

/**
 * Parse CSV text into a table. Every value stays a string; typing is the
 * clean stage's job.
 */
export function decodeCsv(text: string): Table {
  const workbook = XLSX.read(quoteLeadingId(text), { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) return { columns: [], rows: [] };
  const sheet = workbook.Sheets[sheetName];

  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
    defval: null,
    raw: true,
  });
  const rows = records.map((record) => {
    const row: Row = {};
    for (const [key, v] of Object.entries(record)) row[key] = toCell(v);
    return row;
  });
  return tableFromRows(rows);
}
