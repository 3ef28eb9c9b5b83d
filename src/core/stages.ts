/**
 * The six stages, in run order:
 * load_settings → download → export_raw → clean → export_clean → load_warehouse.
 */
import { ZodError } from "zod";

import { cleanRecords } from "../clean/rules.js";
import { FetchAdapter } from "../fetch/adapter.js";
import { SnapshotSink } from "../storage/sink.js";
import { loadTargetFor, resolveTableName, WarehouseLoader } from "../warehouse/loader.js";
import { ConfigError } from "./exceptions.js";
import { formatIssues, readSettings, type Settings } from "./settings.js";
import { defineStage, type StageContext } from "./stage.js";
import { tableFromRows } from "./table.js";

function sinkFor(settings: Settings, ctx: StageContext): SnapshotSink {
  return new SnapshotSink(
    ctx.storageFor(settings.storage.bucket),
    settings.storage.pathTemplate,
    settings.pipeline,
  );
}

export const loadSettings = defineStage<never, "settings" | "runId" | "runStartedAt">({
  name: "load_settings",
  requires: [],
  provides: ["settings", "runId", "runStartedAt"],
  async run(_input, ctx) {
    const document = await readSettings(ctx.settingsPath);
    if (document.pipeline !== ctx.pipeline) {
      throw new ConfigError(
        `${ctx.settingsPath} configures pipeline "${document.pipeline}", not "${ctx.pipeline}"`,
      );
    }

    let parameters: Record<string, unknown>;
    try {
      parameters = new ctx.definition.extraction().resolveParameters(
        { ...document.parameters, ...ctx.parameters },
        ctx.startedAt,
      );
    } catch (err) {
      if (err instanceof ZodError) {
        throw new ConfigError(`parameters: ${formatIssues(err)}`);
      }
      throw err;
    }

    const keyEnv = document.endpoint.apiKeyEnv;
    if (keyEnv && !ctx.env[keyEnv]) {
      throw new ConfigError(`environment variable ${keyEnv} is not set`);
    }

    const settings: Settings = { ...document, parameters };
    // A bad shard parameter fails here, before anything is fetched.
    resolveTableName(settings);

    return {
      settings,
      runId: ctx.runId,
      runStartedAt: ctx.startedAt,
    };
  },
});

export const download = defineStage({
  name: "download",
  requires: ["settings"],
  provides: ["response", "raw"],
  async run({ settings }, ctx) {
    const keyEnv = settings.endpoint.apiKeyEnv;
    const apiKey = keyEnv ? ctx.env[keyEnv] : undefined;
    const fetcher = new FetchAdapter(ctx.http, {
      ...settings.fetch,
      defaultQuery: apiKey ? { [settings.endpoint.apiKeyParam]: apiKey } : undefined,
      signal: ctx.signal,
      log: ctx.log,
    });

    const { response, records } = await new ctx.definition.extraction().extract(
      settings,
      fetcher,
      ctx.log,
    );
    const raw = tableFromRows(records);
    ctx.log.info(`downloaded ${raw.rows.length} records`);
    return { response, raw };
  },
});

export const exportRaw = defineStage({
  name: "export_raw",
  requires: ["settings", "raw", "runStartedAt"],
  provides: ["rawPath"],
  async run({ settings, raw, runStartedAt }, ctx) {
    const rawPath = await sinkFor(settings, ctx).write("raw", raw, runStartedAt);
    ctx.log.info(`raw snapshot written to ${rawPath}`);
    return { rawPath };
  },
});

export const clean = defineStage({
  name: "clean",
  requires: ["settings", "raw"],
  provides: ["clean", "cleanReport"],
  async run({ settings, raw }, ctx) {
    const reshaped = new ctx.definition.transform().reshape(raw.rows, settings, ctx.log);
    const { table, report } = cleanRecords(reshaped, settings, ctx.log);
    ctx.log.info(
      `cleaned ${report.input} -> ${report.output} rows ` +
        `(incomplete ${report.incomplete}, rejected ${report.rejected}, ` +
        `out of range ${report.outOfRange}, duplicates ${report.duplicates})`,
    );
    return { clean: table, cleanReport: report };
  },
});

export const exportClean = defineStage({
  name: "export_clean",
  requires: ["settings", "clean", "runStartedAt"],
  provides: ["cleanPath"],
  async run({ settings, clean: table, runStartedAt }, ctx) {
    const cleanPath = await sinkFor(settings, ctx).write("clean", table, runStartedAt);
    ctx.log.info(`clean snapshot written to ${cleanPath}`);
    return { cleanPath };
  },
});

export const loadWarehouse = defineStage({
  name: "load_warehouse",
  requires: ["settings", "clean"],
  provides: ["loaded"],
  async run({ settings, clean: table }, ctx) {
    const loader = new WarehouseLoader(ctx.db, ctx.log);
    const loaded = await loader.load(table, loadTargetFor(settings), {
      retries: settings.warehouse.retries,
      retryDelayMs: settings.warehouse.retryDelayMs,
      timeoutMs: settings.warehouse.timeoutMs,
      signal: ctx.signal,
    });
    return { loaded };
  },
});

export const STAGES = [
  loadSettings,
  download,
  exportRaw,
  clean,
  exportClean,
  loadWarehouse,
] as const;
