/**
 * York footfall: a single open-data file. Column renames and the zero fill
 * come from the settings schema; the transform only stamps the city.
 */
import { z } from "zod";

import type {
  Extraction,
  ExtractionStrategy,
  TransformStrategy,
} from "../../core/etl.js";
import type { Logger } from "../../core/logger.js";
import type { Settings } from "../../core/settings.js";
import { flattenRecord, isRecord } from "../../core/table.js";
import type { Row } from "../../core/types.js";
import type { FetchAdapter } from "../../fetch/adapter.js";
import { endpointFor, parseResponse } from "../shared.js";
import { YorkParametersSchema } from "./schemas.js";

const RecordsSchema = z.array(z.record(z.unknown()));

export class YorkExtractionStrategy implements ExtractionStrategy {
  resolveParameters(raw: Record<string, unknown>): Record<string, unknown> {
    return YorkParametersSchema.parse(raw);
  }

  async extract(settings: Settings, fetcher: FetchAdapter, log: Logger): Promise<Extraction> {
    const endpoint = endpointFor(settings);
    if (settings.endpoint.format === "csv") {
      const table = await fetcher.fetchCsv(endpoint);
      log.info(`${table.rows.length} rows`);
      return { response: table, records: table.rows };
    }

    const body = await fetcher.fetchJson(endpoint);
    const items = isRecord(body) && Array.isArray(body.records) ? body.records : body;
    const records = parseResponse(RecordsSchema, items, endpoint.resolved).map((item) =>
      flattenRecord(item),
    );
    log.info(`${records.length} records`);
    return { response: body, records };
  }
}

export class YorkTransformStrategy implements TransformStrategy {
  reshape(rows: Row[], settings: Settings): Row[] {
    const { city } = YorkParametersSchema.parse(settings.parameters);
    return rows.map((row) => ({ ...row, city }));
  }
}
