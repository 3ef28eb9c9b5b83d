/**
 * footfall-etl – settings-driven ETL pipelines for weather, public holiday
 * and footfall data.
 */
import { randomUUID } from "node:crypto";
import axios, { type AxiosInstance } from "axios";

import { buildDb, buildStorageFactory, defaultSettingsPath, type Config } from "./config.js";
import { consoleLogger, type Logger } from "./core/logger.js";
import { runPipeline, type RunResult } from "./core/runner.js";
import { DbRunLog } from "./core/runlog.js";
import type { RunOptions } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import type { StorageFactory } from "./storage/backend.js";
import { getPipelineDefinition } from "./pipelines/registry.js";

export { PipelineName, PIPELINE_REGISTRY } from "./pipelines/registry.js";
export { configFromEnv, parseConfig, type Config } from "./config.js";
export * from "./core/exceptions.js";
export type { RunResult } from "./core/runner.js";
export type { RunState } from "./core/state.js";
export type { RunOptions } from "./core/types.js";

export interface PipelineRunnerOptions {
  storageFor: StorageFactory;
  db: DatabaseBackend;
  http?: AxiosInstance;
  /** Defaults to a console logger scoped to the pipeline. */
  logger?: (pipeline: string) => Logger;
  env?: Record<string, string | undefined>;
}

export class PipelineRunner {
  private storageFor: StorageFactory;
  private db: DatabaseBackend;
  private http: AxiosInstance;
  private logger: (pipeline: string) => Logger;
  private env: Record<string, string | undefined>;

  constructor(opts: PipelineRunnerOptions) {
    this.storageFor = opts.storageFor;
    this.db = opts.db;
    this.http = opts.http ?? axios.create();
    this.logger = opts.logger ?? ((pipeline) => consoleLogger(`pipeline:${pipeline}`));
    this.env = opts.env ?? process.env;
  }

  /** Construct from a validated configuration and initialise the run log. */
  static async fromConfig(
    config: Config,
    opts: Omit<PipelineRunnerOptions, "storageFor" | "db"> = {},
  ): Promise<PipelineRunner> {
    const runner = new PipelineRunner({
      ...opts,
      storageFor: buildStorageFactory(config.storage),
      db: buildDb(config.warehouse),
    });
    await runner.initialize();
    return runner;
  }

  /** Create the run-log tables. Call once after construction. */
  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  /**
   * Run `pipeline` once.
   * @throws UnsupportedPipelineError for an unknown pipeline name; every
   * other failure is reported in the result.
   */
  async run(pipeline: string, opts: RunOptions = {}): Promise<RunResult> {
    const definition = getPipelineDefinition(pipeline);
    return runPipeline(
      {
        pipeline,
        definition,
        settingsPath: opts.settingsPath ?? defaultSettingsPath(pipeline),
        parameters: opts.parameters ?? {},
        runId: randomUUID(),
        startedAt: opts.now ?? new Date(),
        http: this.http,
        storageFor: this.storageFor,
        db: this.db,
        log: this.logger(pipeline),
        env: this.env,
        signal: opts.signal,
      },
      new DbRunLog(this.db),
    );
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
