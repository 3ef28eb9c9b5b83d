#!/usr/bin/env node
/**
 * CLI entrypoint for footfall-etl.
 *
 * Usage:
 *   footfall-etl holidays
 *   footfall-etl historic --date 2024-03-01
 *   footfall-etl footfall-york --settings ./my-york.json
 */
import { config as loadDotenv } from "dotenv";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { configFromEnv } from "./config.js";
import { PipelineError } from "./core/exceptions.js";
import { PipelineRunner } from "./index.js";
import { PIPELINE_REGISTRY, isPipelineName } from "./pipelines/registry.js";

const USAGE = `
footfall-etl: run one ETL pipeline once

Usage:
  footfall-etl <pipeline> [--settings <file>] [--date <yyyy-mm-dd>]
  footfall-etl --list

Options:
  --settings <file>   Settings document (default: settings/<pipeline>.json)
  --date <date>       Day to fetch, for pipelines that take one
  --list              List the available pipelines
  --help              Show this help

Environment:
  ETL_STORAGE_PROVIDER   disk | s3           (default: disk)
  ETL_STORAGE_PATH       disk storage root   (default: ./data)
  ETL_S3_ENDPOINT, ETL_S3_REGION, ETL_S3_PREFIX
  ETL_WAREHOUSE_PROVIDER sqlite | postgres   (default: sqlite)
  ETL_WAREHOUSE_PATH     SQLite file         (default: ./warehouse.db)
  ETL_WAREHOUSE_URL      PostgreSQL connection string
`.trim();

function parseCliArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      settings: { type: "string" },
      date: { type: "string" },
      list: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

export interface CliDeps {
  log?: (message: string) => void;
  error?: (message: string) => void;
  env?: Record<string, string | undefined>;
  /** Builds the runner; defaults to one configured from `env`. */
  createRunner?: (env: Record<string, string | undefined>) => Promise<PipelineRunner>;
  signal?: AbortSignal;
}

/** Parse `args` (without the node and script paths), run, and return the exit code. */
export async function runCli(
  args: string[],
  {
    log = console.log,
    error = console.error,
    env = process.env,
    createRunner = (e) => PipelineRunner.fromConfig(configFromEnv(e), { env: e }),
    signal,
  }: CliDeps = {},
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(args);
  } catch (err) {
    error(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
    return 2;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    log(USAGE);
    return 0;
  }

  if (values.list) {
    for (const [name, def] of Object.entries(PIPELINE_REGISTRY)) {
      log(`${name.padEnd(16)} ${def.description}`);
    }
    return 0;
  }

  const [pipeline, ...extra] = positionals;
  if (pipeline === undefined || extra.length > 0) {
    error(USAGE);
    return 2;
  }
  if (!isPipelineName(pipeline)) {
    error(`Unknown pipeline: ${pipeline}\nRun with --list to see the available pipelines.`);
    return 2;
  }
  if (values.date !== undefined && !/^\d{4}-\d{2}-\d{2}$/.test(values.date)) {
    error(`--date must be YYYY-MM-DD, got ${values.date}`);
    return 2;
  }

  let runner: PipelineRunner;
  try {
    runner = await createRunner(env);
  } catch (err) {
    if (err instanceof PipelineError) {
      error(err.message);
      return 1;
    }
    throw err;
  }

  try {
    const result = await runner.run(pipeline, {
      settingsPath: values.settings,
      parameters: values.date === undefined ? {} : { date: values.date },
      signal,
    });
    if (result.status === "done") {
      log(`${pipeline}: ${result.rowsLoaded} rows loaded (run ${result.runId})`);
      return 0;
    }
    error(`${pipeline}: failed in ${result.error?.stage ?? "unknown stage"}: ${result.error?.message ?? ""}`);
    return 1;
  } finally {
    await runner.close();
  }
}

function isMain(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
}

if (isMain()) {
  loadDotenv();
  const controller = new AbortController();
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.once(sig, () => {
      console.error(`Received ${sig}, cancelling run`);
      controller.abort();
    });
  }
  runCli(process.argv.slice(2), { signal: controller.signal }).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
