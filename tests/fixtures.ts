/**
 * Shared test fixtures: temp dirs, a stub HTTP transport, settings documents
 * and a pre-configured runner.
 */
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";

import { PipelineRunner } from "../src/index.js";
import { silentLogger } from "../src/core/logger.js";
import type { StageContext } from "../src/core/stage.js";
import { parseSettings, type Settings } from "../src/core/settings.js";
import { isRecord } from "../src/core/table.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { PIPELINE_REGISTRY, PipelineName } from "../src/pipelines/registry.js";
import { DiskStorage } from "../src/storage/disk.js";

// ---------------------------------------------------------------------------
// Temp dir helpers
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "footfall-etl-test-"));
}

export function writeJson(dir: string, name: string, value: unknown): string {
  const p = join(dir, name);
  writeFileSync(p, JSON.stringify(value, null, 2));
  return p;
}

// ---------------------------------------------------------------------------
// Stub HTTP transport
// ---------------------------------------------------------------------------

export type StubReply = { status: number; body: unknown } | "network-error";

export interface StubCall {
  url: string;
  params: Record<string, unknown>;
}

export type StubHandler = (call: StubCall) => StubReply;

/**
 * An axios instance whose adapter answers from `handler` instead of the
 * network. Non-string bodies are sent as JSON text.
 */
export function stubHttp(handler: StubHandler): { http: AxiosInstance; calls: StubCall[] } {
  const calls: StubCall[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const call: StubCall = {
        url: config.url ?? "",
        params: isRecord(config.params) ? { ...config.params } : {},
      };
      calls.push(call);
      const reply = handler(call);
      if (reply === "network-error") {
        throw new AxiosError("socket hang up", "ECONNRESET", config);
      }
      const response: AxiosResponse = {
        data: typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body),
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response,
        );
      }
      return response;
    },
  });
  return { http, calls };
}

/** Replies in order; the last one repeats. */
export function sequence(...replies: StubReply[]): StubHandler {
  let i = 0;
  return () => {
    const reply = replies[Math.min(i, replies.length - 1)];
    i++;
    if (reply === undefined) throw new Error("sequence() needs at least one reply");
    return reply;
  };
}

export function ok(body: unknown): StubReply {
  return { status: 200, body };
}

// ---------------------------------------------------------------------------
// Settings documents
// ---------------------------------------------------------------------------

export const HOLIDAYS_SETTINGS = {
  pipeline: "holidays",
  endpoint: { url: "https://holidays.test/api/{year}/{countryCode}" },
  fetch: { retries: 0, timeoutMs: 1000, retryDelayMs: 0 },
  schema: [
    { name: "date", type: "DATE", mode: "REQUIRED" },
    { name: "name", type: "STRING", mode: "REQUIRED" },
  ],
  primaryKey: ["date", "name"],
  storage: { bucket: "test-bucket" },
  warehouse: { table: "holidays.holidays", retries: 0, retryDelayMs: 0 },
  parameters: { startYear: 2024, endYear: 2024 },
};

/** A small generic document for the cleaning and loader tests. */
export const EVENTS_SETTINGS = {
  pipeline: "events",
  endpoint: { url: "https://events.test/api" },
  schema: [
    { name: "id", type: "INTEGER", mode: "REQUIRED" },
    { name: "day", type: "DATE", mode: "REQUIRED" },
    { name: "label", type: "STRING" },
    { name: "score", type: "FLOAT" },
  ],
  primaryKey: ["id"],
  storage: { bucket: "test-bucket" },
  warehouse: { table: "events.events", retries: 0, retryDelayMs: 0 },
};

export function makeSettings(overrides: Record<string, unknown> = {}): Settings {
  return parseSettings({ ...EVENTS_SETTINGS, ...overrides });
}

// ---------------------------------------------------------------------------
// Pre-configured runner
// ---------------------------------------------------------------------------

export async function makeRunner(
  dir: string,
  http: AxiosInstance,
  env: Record<string, string | undefined> = {},
): Promise<{ runner: PipelineRunner; db: SQLiteBackend; storageRoot: string }> {
  const db = new SQLiteBackend(":memory:");
  const storageRoot = join(dir, "storage");
  const runner = new PipelineRunner({
    storageFor: (bucket) => new DiskStorage(join(storageRoot, bucket)),
    db,
    http,
    logger: () => silentLogger,
    env,
  });
  await runner.initialize();
  return { runner, db, storageRoot };
}

/**
 * A stage context whose HTTP and storage fail loudly if touched.
 */
export function makeContext(overrides: Partial<StageContext> = {}): StageContext {
  return {
    pipeline: PipelineName.Holidays,
    definition: PIPELINE_REGISTRY[PipelineName.Holidays],
    settingsPath: "unused.json",
    parameters: {},
    runId: "run-1",
    startedAt: new Date("2024-01-02T03:04:05Z"),
    http: stubHttp(() => {
      throw new Error("unexpected HTTP call");
    }).http,
    storageFor: () => {
      throw new Error("unexpected storage access");
    },
    db: new SQLiteBackend(":memory:"),
    log: silentLogger,
    env: {},
    ...overrides,
  };
}
