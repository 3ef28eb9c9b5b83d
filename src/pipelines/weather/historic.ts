/**
 * Hourly observed weather per city for a single day.
 */
import { formatDate } from "../../clean/coerce.js";
import type {
  Extraction,
  ExtractionStrategy,
  TransformStrategy,
} from "../../core/etl.js";
import type { Logger } from "../../core/logger.js";
import type { Settings } from "../../core/settings.js";
import { flattenRecord } from "../../core/table.js";
import type { Row } from "../../core/types.js";
import type { FetchAdapter } from "../../fetch/adapter.js";
import { endpointFor, kelvinToCelsius, parseResponse, toNumber } from "../shared.js";
import {
  HistoricParametersSchema,
  HistoricResponseSchema,
  ResolvedHistoricParametersSchema,
} from "./schemas.js";

const DAY_MS = 86_400_000;

export class HistoricExtractionStrategy implements ExtractionStrategy {
  resolveParameters(raw: Record<string, unknown>, now: Date): Record<string, unknown> {
    const parsed = HistoricParametersSchema.parse(raw);
    return {
      ...parsed,
      date: parsed.date ?? formatDate(new Date(now.getTime() - DAY_MS)),
    };
  }

  async extract(settings: Settings, fetcher: FetchAdapter, log: Logger): Promise<Extraction> {
    const { cities, date } = ResolvedHistoricParametersSchema.parse(settings.parameters);
    const start = Date.parse(`${date}T00:00:00Z`) / 1000;
    const responses: Record<string, unknown> = {};
    const records: Row[] = [];

    for (const city of cities) {
      const endpoint = endpointFor(settings, {}, {
        lat: city.lat,
        lon: city.lon,
        type: "hour",
        start,
        cnt: 24,
      });
      const body = await fetcher.fetchJson(endpoint);
      const history = parseResponse(HistoricResponseSchema, body, endpoint.resolved);
      log.info(`${city.name} ${date}: ${history.list.length} hours`);
      responses[city.name] = body;
      for (const hour of history.list) {
        records.push(flattenRecord(hour, "", { city: city.name }));
      }
    }

    return { response: responses, records };
  }
}

/** One row per city and hour, keyed by the hour's timestamp. */
export class HistoricTransformStrategy implements TransformStrategy {
  reshape(rows: Row[]): Row[] {
    return rows.map((row) => {
      const temp = toNumber(row["main.temp"]);
      return {
        city: row.city ?? null,
        // The hour's epoch; cleaning turns it into a TIMESTAMP.
        date: row.dt ?? null,
        temp: temp === null ? null : kelvinToCelsius(temp, 1),
        pressure: row["main.pressure"] ?? null,
        humidity: row["main.humidity"] ?? null,
        clouds: row["clouds.all"] ?? null,
        wind: row["wind.speed"] ?? null,
        rain: toNumber(row["rain.1h"]) ?? 0,
        snow: toNumber(row["snow.1h"]) ?? 0,
      };
    });
  }
}
