/**
 * Drives one run through the stage sequence and the state machine.
 */
import { DataBus, type BusKey } from "./bus.js";
import { RunCancelledError, type StageError } from "./exceptions.js";
import type { RunLog, RunLogEntry } from "./runlog.js";
import { assertContracts, runStage, type Stage, type StageContext } from "./stage.js";
import {
  clean,
  download,
  exportClean,
  exportRaw,
  loadSettings,
  loadWarehouse,
  STAGES,
} from "./stages.js";
import { RunStateMachine, type RunState } from "./state.js";
import type { CleanReport, StageName } from "./types.js";

export interface RunResult {
  runId: string;
  pipeline: string;
  status: "done" | "failed";
  state: RunState;
  /** States entered, in order. */
  history: RunState[];
  error?: StageError;
  rawPath?: string;
  cleanPath?: string;
  cleanReport?: CleanReport;
  rowsLoaded: number;
}

type Progress = Pick<RunLogEntry, "rawPath" | "cleanPath" | "rowsLoaded">;

/**
 * Run every stage in order. Stage failures end the run in Failed and are
 * reported in the result, not thrown.
 */
export async function runPipeline(ctx: StageContext, runLog: RunLog): Promise<RunResult> {
  assertContracts(STAGES);
  const bus = new DataBus();
  const machine = new RunStateMachine();
  let current: StageName = loadSettings.name;

  const progress = (): Progress => ({
    rawPath: bus.get("rawPath"),
    cleanPath: bus.get("cleanPath"),
    rowsLoaded: bus.get("loaded")?.rows,
  });

  // The run log is bookkeeping; its failures never change the run's outcome.
  const record = async (entry: RunLogEntry): Promise<void> => {
    try {
      await runLog.record(ctx.runId, entry);
    } catch (err) {
      ctx.log.error(`could not record state ${entry.state} for run ${ctx.runId}: ${String(err)}`);
    }
  };

  const step = async <In extends BusKey, Out extends BusKey>(
    stage: Stage<In, Out>,
    enter?: Exclude<RunState, "Failed">,
    exit?: Exclude<RunState, "Failed">,
  ): Promise<void> => {
    current = stage.name;
    if (ctx.signal?.aborted) throw new RunCancelledError();
    if (enter) {
      machine.transition(enter);
      await record({ state: enter, ...progress() });
    }
    ctx.log.info(`${stage.name} started`);
    const started = Date.now();
    await runStage(stage, bus, ctx);
    ctx.log.info(`${stage.name} finished in ${Date.now() - started}ms`);
    if (exit) {
      machine.transition(exit);
      await record({ state: exit, ...progress() });
    }
  };

  try {
    await runLog.start(ctx.runId, ctx.pipeline, ctx.startedAt);
  } catch (err) {
    ctx.log.error(`could not record start of run ${ctx.runId}: ${String(err)}`);
  }

  try {
    await step(loadSettings);
    await step(download, "Fetching");
    await step(exportRaw, undefined, "RawPersisted");
    await step(clean, "Cleaning");
    await step(exportClean, undefined, "CleanPersisted");
    await step(loadWarehouse, undefined, "Loaded");
    machine.transition("Done");
    await record({ state: "Done", ...progress() });
    ctx.log.info(`run ${ctx.runId} done, ${bus.get("loaded")?.rows ?? 0} rows loaded`);
  } catch (err) {
    const error = machine.fail(current, err);
    ctx.log.error(`run ${ctx.runId} failed: ${error.message}`);
    await record({
      state: "Failed",
      failedStage: error.stage,
      error: error.message,
      ...progress(),
    });
  }

  return {
    runId: ctx.runId,
    pipeline: ctx.pipeline,
    status: machine.state === "Done" ? "done" : "failed",
    state: machine.state,
    history: machine.history,
    error: machine.error,
    rawPath: bus.get("rawPath"),
    cleanPath: bus.get("cleanPath"),
    cleanReport: bus.get("cleanReport"),
    rowsLoaded: bus.get("loaded")?.rows ?? 0,
  };
}
