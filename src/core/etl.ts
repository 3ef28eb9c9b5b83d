/**
 * ETL strategy interfaces. Each pipeline supplies an extraction (how to call
 * its source and flatten the payload) and a transform (how to reshape the
 * flattened records before the shared cleaning rules).
 */
import type { FetchAdapter } from "../fetch/adapter.js";
import type { Logger } from "./logger.js";
import type { Settings } from "./settings.js";
import type { Row } from "./types.js";

export interface Extraction {
  /** Payload(s) as received, kept on the bus for inspection. */
  response: unknown;
  /** Flattened records for the raw snapshot. */
  records: Row[];
}

/**
 * Calls the pipeline's source through the fetch adapter.
 */
export interface ExtractionStrategy {
  /**
   * Validate the settings document's `parameters` and fill run-dependent
   * defaults. Throws a ZodError for invalid parameters.
   */
  resolveParameters(raw: Record<string, unknown>, now: Date): Record<string, unknown>;

  extract(settings: Settings, fetcher: FetchAdapter, log: Logger): Promise<Extraction>;
}

/**
 * Receives the raw records, returns records keyed by (or sourced into) the
 * declared column names.
 */
export interface TransformStrategy {
  reshape(rows: Row[], settings: Settings, log: Logger): Row[];
}

export interface PipelineDefinition {
  description: string;
  extraction: new () => ExtractionStrategy;
  transform: new () => TransformStrategy;
}
