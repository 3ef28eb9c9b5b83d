/**
 * Stage contract: what a stage reads from the bus, what it adds, and the
 * services it may use while running.
 */
import type { AxiosInstance } from "axios";

import type { DatabaseBackend } from "../db/backend.js";
import type { StorageFactory } from "../storage/backend.js";
import type { BusKey, BusShape, BusView, DataBus } from "./bus.js";
import type { PipelineDefinition } from "./etl.js";
import { MissingKeyError } from "./exceptions.js";
import type { Logger } from "./logger.js";
import type { StageName } from "./types.js";

/** Per-run services. Nothing here is shared between runs. */
export interface StageContext {
  pipeline: string;
  definition: PipelineDefinition;
  settingsPath: string;
  /** Merged over the settings document's `parameters`. */
  parameters: Record<string, unknown>;
  runId: string;
  startedAt: Date;
  http: AxiosInstance;
  storageFor: StorageFactory;
  db: DatabaseBackend;
  log: Logger;
  env: Record<string, string | undefined>;
  signal?: AbortSignal;
}

export interface Stage<In extends BusKey, Out extends BusKey> {
  readonly name: StageName;
  readonly requires: readonly In[];
  readonly provides: readonly Out[];
  run(input: BusView<In>, ctx: StageContext): Promise<Pick<BusShape, Out>>;
}

/** The key lists of a stage, without its body. */
export interface StageContract {
  readonly name: StageName;
  readonly requires: readonly BusKey[];
  readonly provides: readonly BusKey[];
}

export function defineStage<In extends BusKey, Out extends BusKey>(
  stage: Stage<In, Out>,
): Stage<In, Out> {
  return stage;
}

/**
 * Check that every key a stage requires is provided by an earlier one.
 * @throws MissingKeyError for the first unsatisfied requirement.
 */
export function assertContracts(stages: readonly StageContract[]): void {
  const available = new Set<BusKey>();
  for (const stage of stages) {
    for (const key of stage.requires) {
      if (!available.has(key)) throw new MissingKeyError(stage.name, key);
    }
    for (const key of stage.provides) available.add(key);
  }
}

/**
 * View, run, merge. A missing required key fails before the stage body runs.
 */
export async function runStage<In extends BusKey, Out extends BusKey>(
  stage: Stage<In, Out>,
  bus: DataBus,
  ctx: StageContext,
): Promise<void> {
  const input = bus.view(stage.name, stage.requires);
  const output = await stage.run(input, ctx);
  bus.merge(stage.name, stage.provides, output);
}
