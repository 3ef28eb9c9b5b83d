/**
 * Snapshot sink: writes raw and cleaned tables to storage as CSV.
 */
import { SinkError } from "../core/exceptions.js";
import { encodeCsv } from "../core/table.js";
import type { SnapshotMarker, Table } from "../core/types.js";
import type { StorageBackend } from "./backend.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH-mm-ss` in UTC; safe in object keys and file names. */
export function formatRunTimestamp(d: Date): string {
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}-${pad(d.getUTCMinutes())}-${pad(d.getUTCSeconds())}`
  );
}

export class SnapshotSink {
  private storage: StorageBackend;
  private pathTemplate: string;
  private pipeline: string;

  constructor(storage: StorageBackend, pathTemplate: string, pipeline: string) {
    this.storage = storage;
    this.pathTemplate = pathTemplate;
    this.pipeline = pipeline;
  }

  /** Storage key for a snapshot taken at `at`. */
  resolveKey(marker: SnapshotMarker, at: Date): string {
    return this.pathTemplate
      .replaceAll("{pipeline}", this.pipeline)
      .replaceAll("{marker}", marker)
      .replaceAll("{timestamp}", formatRunTimestamp(at));
  }

  /**
   * Write `table` and return where it landed.
   * @throws SinkError when the backend write fails.
   */
  async write(marker: SnapshotMarker, table: Table, at: Date): Promise<string> {
    const key = this.resolveKey(marker, at);
    const location = this.storage.uri(key);
    let csv: string;
    try {
      csv = encodeCsv(table);
    } catch (err) {
      throw new SinkError(location, `cannot encode ${marker} snapshot`, err);
    }
    try {
      await this.storage.write(key, csv);
    } catch (err) {
      throw new SinkError(location, String(err), err);
    }
    return location;
  }
}
