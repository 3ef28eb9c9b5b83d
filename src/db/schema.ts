/**
 * Run-log schema, portable across SQLite and PostgreSQL.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS pipeline_runs (
  id TEXT PRIMARY KEY,
  pipeline TEXT NOT NULL,
  state TEXT NOT NULL,
  failed_stage TEXT,
  error TEXT,
  raw_path TEXT,
  clean_path TEXT,
  rows_loaded INTEGER,
  started_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  finished_at TEXT
);
CREATE INDEX IF NOT EXISTS pipeline_runs_pipeline_idx
  ON pipeline_runs (pipeline, started_at);
`;
