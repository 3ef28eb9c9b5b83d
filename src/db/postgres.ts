/**
 * PostgreSQL database backend using postgres-js.
 */
import postgres from "postgres";
import type {
  DatabaseBackend,
  SqlExecutor,
  SqlRow,
  SqlValue,
} from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

/** Rewrite `?` placeholders to `$1, $2, …`, leaving quoted text alone. */
export function toPositional(sql: string): string {
  let out = "";
  let n = 0;
  let quote: string | null = null;
  for (const ch of sql) {
    if (quote) {
      if (ch === quote) quote = null;
      out += ch;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      out += ch;
    } else if (ch === "?") {
      out += `$${++n}`;
    } else {
      out += ch;
    }
  }
  return out;
}

/** `unsafe()` of the client or of an open transaction. */
type RunQuery = (
  query: string,
  params: SqlValue[],
) => Promise<readonly Record<string, unknown>[]> & { cancel(): void };

/** Statements through `unsafe()`, with `?` placeholders rewritten. */
export class PostgresExecutor implements SqlExecutor {
  private runQuery: RunQuery;
  private signal: AbortSignal | undefined;

  constructor(runQuery: RunQuery, signal?: AbortSignal) {
    this.runQuery = runQuery;
    this.signal = signal;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    await this.run(sql, params);
  }

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    const rows = await this.run(sql, params);
    return rows.map((row) => ({ ...row }));
  }

  async queryOne(sql: string, params: SqlValue[] = []): Promise<SqlRow | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  /** An abort cancels the statement in flight on the server. */
  private async run(sql: string, params: SqlValue[]): Promise<readonly Record<string, unknown>[]> {
    this.signal?.throwIfAborted();
    const pending = this.runQuery(toPositional(sql), params);
    const cancel = (): void => {
      pending.cancel();
    };
    this.signal?.addEventListener("abort", cancel, { once: true });
    try {
      return await pending;
    } finally {
      this.signal?.removeEventListener("abort", cancel);
    }
  }
}

export class PostgresBackend extends PostgresExecutor implements DatabaseBackend {
  readonly dialect = "postgres" as const;
  private client: postgres.Sql;

  constructor(connectionString: string) {
    const client = postgres(connectionString, { onnotice: () => {} });
    super((query, params) => client.unsafe(query, params));
    this.client = client;
  }

  async initialize(): Promise<void> {
    await this.client.unsafe(SCHEMA_SQL);
  }

  async transaction(
    fn: (tx: SqlExecutor) => Promise<void>,
    signal?: AbortSignal,
  ): Promise<void> {
    signal?.throwIfAborted();
    await this.client.begin(async (tx) => {
      await fn(new PostgresExecutor((query, params) => tx.unsafe(query, params), signal));
      // Throwing inside begin() rolls back.
      signal?.throwIfAborted();
    });
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
