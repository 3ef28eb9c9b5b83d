/**
 * Public holidays: one request per year, England only.
 */
import type {
  Extraction,
  ExtractionStrategy,
  TransformStrategy,
} from "../../core/etl.js";
import type { Logger } from "../../core/logger.js";
import type { Settings } from "../../core/settings.js";
import { flattenRecord } from "../../core/table.js";
import type { CellValue, Row } from "../../core/types.js";
import type { FetchAdapter } from "../../fetch/adapter.js";
import { endpointFor, parseResponse } from "../shared.js";
import {
  CountiesSchema,
  HolidaysParametersSchema,
  PublicHolidaysResponseSchema,
  ResolvedHolidaysParametersSchema,
  type HolidaysParameters,
} from "./schemas.js";

function params(settings: Settings): HolidaysParameters {
  return ResolvedHolidaysParametersSchema.parse(settings.parameters);
}

export class HolidaysExtractionStrategy implements ExtractionStrategy {
  resolveParameters(raw: Record<string, unknown>, now: Date): Record<string, unknown> {
    const parsed = HolidaysParametersSchema.parse(raw);
    // Next year's dates are published early; fetch them too.
    const endYear = parsed.endYear ?? now.getUTCFullYear() + 1;
    return ResolvedHolidaysParametersSchema.parse({ ...parsed, endYear });
  }

  async extract(settings: Settings, fetcher: FetchAdapter, log: Logger): Promise<Extraction> {
    const { startYear, endYear, countryCode } = params(settings);
    const responses: unknown[] = [];
    const records: Row[] = [];

    for (let year = startYear; year <= endYear; year++) {
      const endpoint = endpointFor(settings, { year, countryCode });
      const body = await fetcher.fetchJson(endpoint);
      const holidays = parseResponse(PublicHolidaysResponseSchema, body, endpoint.resolved);
      log.info(`${year}: ${holidays.length} holidays`);
      responses.push(body);
      for (const holiday of holidays) records.push(flattenRecord(holiday));
    }

    return { response: responses, records };
  }
}

function counties(cell: CellValue | undefined): string[] | null {
  if (typeof cell !== "string" || cell === "") return null;
  return CountiesSchema.parse(JSON.parse(cell));
}

export class HolidaysTransformStrategy implements TransformStrategy {
  reshape(rows: Row[], settings: Settings): Row[] {
    const { subdivision, alwaysInclude } = params(settings);
    return rows
      .filter((row) => {
        const list = counties(row.counties);
        return (
          list === null ||
          list.includes(subdivision) ||
          (typeof row.name === "string" && alwaysInclude.includes(row.name))
        );
      })
      .map((row) => ({ date: row.date ?? null, name: row.localName ?? row.name ?? null }));
  }
}
