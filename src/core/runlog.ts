/**
 * Run log: one `pipeline_runs` row per run, updated on every transition.
 */
import type { DatabaseBackend } from "../db/backend.js";
import type { RunState } from "./state.js";
import type { StageName } from "./types.js";

export interface RunLogEntry {
  state: RunState;
  failedStage?: StageName;
  error?: string;
  rawPath?: string;
  cleanPath?: string;
  rowsLoaded?: number;
}

export interface RunLog {
  start(runId: string, pipeline: string, startedAt: Date): Promise<void>;
  record(runId: string, entry: RunLogEntry): Promise<void>;
}

export class DbRunLog implements RunLog {
  private db: DatabaseBackend;

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  async start(runId: string, pipeline: string, startedAt: Date): Promise<void> {
    const at = startedAt.toISOString();
    await this.db.execute(
      `INSERT INTO pipeline_runs (id, pipeline, state, started_at, updated_at) VALUES (?, ?, ?, ?, ?)`,
      [runId, pipeline, "Init", at, at],
    );
  }

  async record(runId: string, entry: RunLogEntry): Promise<void> {
    const now = new Date().toISOString();
    const finished = entry.state === "Done" || entry.state === "Failed";
    await this.db.execute(
      `UPDATE pipeline_runs
         SET state = ?,
             failed_stage = COALESCE(?, failed_stage),
             error = COALESCE(?, error),
             raw_path = COALESCE(?, raw_path),
             clean_path = COALESCE(?, clean_path),
             rows_loaded = COALESCE(?, rows_loaded),
             updated_at = ?,
             finished_at = ?
       WHERE id = ?`,
      [
        entry.state,
        entry.failedStage ?? null,
        entry.error ?? null,
        entry.rawPath ?? null,
        entry.cleanPath ?? null,
        entry.rowsLoaded ?? null,
        now,
        finished ? now : null,
        runId,
      ],
    );
  }
}

