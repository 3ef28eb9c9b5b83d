/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import type {
  DatabaseBackend,
  SqlExecutor,
  SqlRow,
  SqlValue,
} from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

type Bound = string | number | null;

/** SQLite has no boolean type; store them as 0/1. */
function bind(params: SqlValue[]): Bound[] {
  return params.map((p) => (typeof p === "boolean" ? (p ? 1 : 0) : p));
}

class SQLiteExecutor implements SqlExecutor {
  protected db: Database.Database;
  private signal: AbortSignal | undefined;

  constructor(db: Database.Database, signal?: AbortSignal) {
    this.db = db;
    this.signal = signal;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    this.signal?.throwIfAborted();
    this.db.prepare<Bound[]>(sql).run(...bind(params));
  }

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    this.signal?.throwIfAborted();
    return this.db.prepare<Bound[], SqlRow>(sql).all(...bind(params));
  }

  async queryOne(sql: string, params: SqlValue[] = []): Promise<SqlRow | null> {
    this.signal?.throwIfAborted();
    const row = this.db.prepare<Bound[], SqlRow>(sql).get(...bind(params));
    return row ?? null;
  }
}

export class SQLiteBackend extends SQLiteExecutor implements DatabaseBackend {
  readonly dialect = "sqlite" as const;

  constructor(path: string = ":memory:") {
    const db = new Database(path);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    super(db);
  }

  async initialize(): Promise<void> {
    this.db.exec(SCHEMA_SQL);
  }

  async transaction(
    fn: (tx: SqlExecutor) => Promise<void>,
    signal?: AbortSignal,
  ): Promise<void> {
    signal?.throwIfAborted();
    this.db.exec("BEGIN");
    try {
      await fn(new SQLiteExecutor(this.db, signal));
      signal?.throwIfAborted();
      this.db.exec("COMMIT");
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
