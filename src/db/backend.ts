/**
 * Abstract database backend interface for the warehouse.
 *
 * All implementations use raw SQL with `?` placeholders; no ORM.
 */

export type SqlValue = string | number | boolean | null;

export type SqlRow = Record<string, unknown>;

export type SqlDialect = "sqlite" | "postgres";

/** Statement execution, shared by backends and open transactions. */
export interface SqlExecutor {
  /** Execute a write statement (CREATE, INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlValue[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query(sql: string, params?: SqlValue[]): Promise<SqlRow[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne(sql: string, params?: SqlValue[]): Promise<SqlRow | null>;
}

export interface DatabaseBackend extends SqlExecutor {
  readonly dialect: SqlDialect;

  /** Create the run-log tables. */
  initialize(): Promise<void>;

  /**
   * Execute `fn` inside a transaction; it commits only if `fn` resolves.
   * Once `signal` aborts no further statement runs and the transaction rolls
   * back; the returned promise settles after the rollback.
   */
  transaction(fn: (tx: SqlExecutor) => Promise<void>, signal?: AbortSignal): Promise<void>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
