/**
 * Error taxonomy for pipeline runs.
 */
import type { StageName } from "./types.js";

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/** The settings document or runtime configuration is unusable. Fatal, raised before any network call. */
export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = "ConfigError";
  }
}

export type FetchErrorKind = "transient" | "permanent";

export class FetchError extends PipelineError {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    opts: { status?: number; cause?: unknown } = {},
  ) {
    super(`Fetch failed (${kind}) for ${url}: ${message}`, { cause: opts.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.status = opts.status;
  }
}

/** A stage needed a data-bus key that no earlier stage wrote. */
export class MissingKeyError extends PipelineError {
  readonly stage: StageName;
  readonly key: string;

  constructor(stage: StageName, key: string) {
    super(`Stage "${stage}" requires data-bus key "${key}", which is not set`);
    this.name = "MissingKeyError";
    this.stage = stage;
    this.key = key;
  }
}

/** A value could not be coerced to its declared column type in strict mode. */
export class SchemaViolationError extends PipelineError {
  readonly column: string;
  readonly value: unknown;
  readonly type: string;

  constructor(column: string, value: unknown, type: string) {
    super(`Value ${JSON.stringify(value)} in column "${column}" is not a valid ${type}`);
    this.name = "SchemaViolationError";
    this.column = column;
    this.value = value;
    this.type = type;
  }
}

export class SinkError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(`Snapshot write failed for ${path}: ${message}`, { cause });
    this.name = "SinkError";
    this.path = path;
  }
}

export type LoadErrorKind = "validation" | "transport";

export class LoadError extends PipelineError {
  readonly kind: LoadErrorKind;
  readonly column?: string;
  readonly row?: number;

  constructor(
    kind: LoadErrorKind,
    message: string,
    opts: { column?: string; row?: number; cause?: unknown } = {},
  ) {
    super(`Warehouse load failed (${kind}): ${message}`, { cause: opts.cause });
    this.name = "LoadError";
    this.kind = kind;
    this.column = opts.column;
    this.row = opts.row;
  }
}

/** Wraps whatever a stage threw, tagged with the stage name. */
export class StageError extends PipelineError {
  readonly stage: StageName;

  constructor(stage: StageName, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Stage "${stage}" failed: ${detail}`, { cause });
    this.name = "StageError";
    this.stage = stage;
  }
}

export class StateTransitionError extends PipelineError {
  constructor(from: string, to: string) {
    super(`Illegal run state transition: ${from} -> ${to}`);
    this.name = "StateTransitionError";
  }
}

export class RunCancelledError extends PipelineError {
  constructor(message = "Run cancelled") {
    super(message);
    this.name = "RunCancelledError";
  }
}

export class UnsupportedPipelineError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedPipelineError";
  }
}
