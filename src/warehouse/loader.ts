/**
 * Warehouse loader: schema validation, then one transaction per attempt.
 */
import { setTimeout as sleep } from "node:timers/promises";

import { matchesType, type ColumnType } from "../clean/coerce.js";
import { ConfigError, LoadError, RunCancelledError } from "../core/exceptions.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { ColumnSchema, Settings } from "../core/settings.js";
import type { LoadReport, Row, Table } from "../core/types.js";
import type { DatabaseBackend, SqlDialect, SqlExecutor, SqlValue } from "../db/backend.js";

const CHUNK_SIZE = 100;

const COLUMN_DDL: Record<SqlDialect, Record<ColumnType, string>> = {
  sqlite: {
    STRING: "TEXT",
    INTEGER: "INTEGER",
    FLOAT: "REAL",
    BOOLEAN: "INTEGER",
    DATE: "TEXT",
    TIMESTAMP: "TEXT",
  },
  postgres: {
    STRING: "text",
    INTEGER: "bigint",
    FLOAT: "double precision",
    BOOLEAN: "boolean",
    DATE: "date",
    TIMESTAMP: "timestamp",
  },
};

export interface LoadTarget {
  /** `<dataset>.<table>` or `<table>`. */
  table: string;
  schema: ColumnSchema[];
  primaryKey: string[];
  writeMode: "append" | "replace";
  historyTable?: string;
}

export interface LoadOptions {
  retries: number;
  retryDelayMs: number;
  /** Bounds every attempt together, waits included. Expiry rolls back the attempt in flight. */
  timeoutMs: number;
  signal?: AbortSignal;
}

function quote(name: string): string {
  return `"${name}"`;
}

/**
 * SQLite has no schemas, so `dataset.table` becomes one quoted name there.
 */
export function quoteTable(dialect: SqlDialect, table: string): string {
  if (dialect === "sqlite") return quote(table);
  return table.split(".").map(quote).join(".");
}

/**
 * Target table for this run. With `shardBy`, the named date parameter is
 * appended as `_yyyymmdd`.
 */
export function resolveTableName(settings: Settings): string {
  const { table, shardBy } = settings.warehouse;
  if (!shardBy) return table;
  const value = settings.parameters[shardBy];
  if (typeof value !== "string" || !/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new ConfigError(`shard parameter "${shardBy}" must be a YYYY-MM-DD string`);
  }
  return `${table}_${value.replaceAll("-", "")}`;
}

export function loadTargetFor(settings: Settings): LoadTarget {
  return {
    table: resolveTableName(settings),
    schema: settings.schema,
    primaryKey: settings.primaryKey,
    writeMode: settings.warehouse.writeMode,
    historyTable: settings.warehouse.historyTable,
  };
}

export class WarehouseLoader {
  private db: DatabaseBackend;
  private log: Logger;

  constructor(db: DatabaseBackend, log: Logger = silentLogger) {
    this.db = db;
    this.log = log;
  }

  /**
   * Check column names, order, types and nullability against the schema.
   * @throws LoadError of kind `validation` naming the first offending column and row.
   */
  validate(table: Table, schema: ColumnSchema[]): void {
    const declared = schema.map((c) => c.name);
    const mismatch = declared.findIndex((name, i) => table.columns[i] !== name);
    if (mismatch !== -1 || table.columns.length !== declared.length) {
      const column = declared[mismatch] ?? table.columns[declared.length];
      throw new LoadError(
        "validation",
        `columns [${table.columns.join(", ")}] do not match declared [${declared.join(", ")}]`,
        { column },
      );
    }

    table.rows.forEach((row, i) => {
      for (const col of schema) {
        const value = row[col.name] ?? null;
        if (value === null) {
          if (col.mode === "REQUIRED") {
            throw new LoadError("validation", `row ${i}: "${col.name}" is required`, {
              column: col.name,
              row: i,
            });
          }
          continue;
        }
        if (!matchesType(value, col.type)) {
          throw new LoadError(
            "validation",
            `row ${i}: ${JSON.stringify(value)} is not a valid ${col.type} for "${col.name}"`,
            { column: col.name, row: i },
          );
        }
      }
    });
  }

  /**
   * Validate, then write `table` to the target in one transaction. Backend
   * failures are retried; the timeout is not. A timed-out or cancelled
   * attempt is rolled back before this rejects.
   */
  async load(table: Table, target: LoadTarget, opts: LoadOptions): Promise<LoadReport> {
    this.validate(table, target.schema);

    const deadline = Date.now() + opts.timeoutMs;
    for (let attempt = 0; ; attempt++) {
      if (opts.signal?.aborted) throw new RunCancelledError();
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new LoadError("transport", `timed out loading ${target.table}`);
      }

      const attemptAbort = new AbortController();
      const timer = setTimeout(() => attemptAbort.abort(), remaining);
      const cancel = (): void => attemptAbort.abort();
      opts.signal?.addEventListener("abort", cancel, { once: true });
      try {
        await this.transmit(table, target, attemptAbort.signal);
        this.log.info(`loaded ${table.rows.length} rows into ${target.table}`);
        return {
          table: target.table,
          rows: table.rows.length,
          historyTable: target.historyTable,
        };
      } catch (err) {
        if (opts.signal?.aborted) throw new RunCancelledError();
        if (attemptAbort.signal.aborted) {
          throw new LoadError("transport", `timed out loading ${target.table}`, { cause: err });
        }
        if (err instanceof LoadError) throw err;
        const failure = new LoadError("transport", String(err), { cause: err });
        if (attempt >= opts.retries) throw failure;
        const delay = opts.retryDelayMs * 2 ** attempt;
        this.log.warn(
          `load attempt ${attempt + 1}/${opts.retries + 1} failed, retrying in ${delay}ms: ${failure.message}`,
        );
        await this.wait(delay, opts.signal);
      } finally {
        clearTimeout(timer);
        opts.signal?.removeEventListener("abort", cancel);
      }
    }
  }

  private async transmit(table: Table, target: LoadTarget, signal: AbortSignal): Promise<void> {
    const dialect = this.db.dialect;
    await this.db.transaction(async (tx) => {
      const name = quoteTable(dialect, target.table);
      await this.ensureTable(tx, target.table, target.schema);
      if (target.writeMode === "replace") {
        await tx.execute(`DELETE FROM ${name}`);
      }
      await this.insertRows(tx, name, table);

      if (target.historyTable) {
        const history = quoteTable(dialect, target.historyTable);
        await this.ensureTable(tx, target.historyTable, target.schema);
        await this.deleteKeys(tx, history, target.primaryKey, table.rows);
        await this.insertRows(tx, history, table);
      }
    }, signal);
  }

  private async ensureTable(
    tx: SqlExecutor,
    table: string,
    schema: ColumnSchema[],
  ): Promise<void> {
    const dialect = this.db.dialect;
    const [dataset] = table.split(".");
    if (dialect === "postgres" && table.includes(".") && dataset) {
      await tx.execute(`CREATE SCHEMA IF NOT EXISTS ${quote(dataset)}`);
    }
    const columns = schema.map(
      (c) =>
        `${quote(c.name)} ${COLUMN_DDL[dialect][c.type]}${c.mode === "REQUIRED" ? " NOT NULL" : ""}`,
    );
    await tx.execute(
      `CREATE TABLE IF NOT EXISTS ${quoteTable(dialect, table)} (${columns.join(", ")})`,
    );
  }

  private async insertRows(tx: SqlExecutor, name: string, table: Table): Promise<void> {
    const columns = table.columns.map(quote).join(", ");
    const placeholders = `(${table.columns.map(() => "?").join(", ")})`;
    for (let i = 0; i < table.rows.length; i += CHUNK_SIZE) {
      const chunk = table.rows.slice(i, i + CHUNK_SIZE);
      const params: SqlValue[] = chunk.flatMap((row) =>
        table.columns.map((c) => row[c] ?? null),
      );
      await tx.execute(
        `INSERT INTO ${name} (${columns}) VALUES ${chunk.map(() => placeholders).join(", ")}`,
        params,
      );
    }
  }

  private async deleteKeys(
    tx: SqlExecutor,
    name: string,
    keys: string[],
    rows: Row[],
  ): Promise<void> {
    const match = `(${keys.map((k) => `${quote(k)} = ?`).join(" AND ")})`;
    for (let i = 0; i < rows.length; i += CHUNK_SIZE) {
      const chunk = rows.slice(i, i + CHUNK_SIZE);
      const params: SqlValue[] = chunk.flatMap((row) => keys.map((k) => row[k] ?? null));
      await tx.execute(
        `DELETE FROM ${name} WHERE ${chunk.map(() => match).join(" OR ")}`,
        params,
      );
    }
  }

  private async wait(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return;
    try {
      await sleep(ms, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) throw new RunCancelledError();
      throw err;
    }
  }
}
