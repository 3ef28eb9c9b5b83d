/**
 * Daily climate forecast per city.
 */
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
import { ForecastParametersSchema, ForecastResponseSchema } from "./schemas.js";

export class ForecastExtractionStrategy implements ExtractionStrategy {
  resolveParameters(raw: Record<string, unknown>): Record<string, unknown> {
    return ForecastParametersSchema.parse(raw);
  }

  async extract(settings: Settings, fetcher: FetchAdapter, log: Logger): Promise<Extraction> {
    const { cities, days } = ForecastParametersSchema.parse(settings.parameters);
    const responses: Record<string, unknown> = {};
    const records: Row[] = [];

    for (const city of cities) {
      const endpoint = endpointFor(settings, {}, { lat: city.lat, lon: city.lon, cnt: days });
      const body = await fetcher.fetchJson(endpoint);
      const forecast = parseResponse(ForecastResponseSchema, body, endpoint.resolved);
      log.info(`${city.name}: ${forecast.list.length} days`);
      responses[city.name] = body;
      for (const day of forecast.list) {
        records.push(flattenRecord(day, "", { city: city.name }));
      }
    }

    return { response: responses, records };
  }
}

export class ForecastTransformStrategy implements TransformStrategy {
  reshape(rows: Row[]): Row[] {
    return rows.map((row) => {
      const min = toNumber(row["temp.min"]);
      const max = toNumber(row["temp.max"]);
      return {
        city: row.city ?? null,
        date: row.dt ?? null,
        min_temp: min === null ? null : kelvinToCelsius(min, 2),
        max_temp: max === null ? null : kelvinToCelsius(max, 2),
        pressure: row.pressure ?? null,
        humidity: row.humidity ?? null,
        clouds: row.clouds ?? null,
        wind: row.speed ?? null,
        rain: toNumber(row.rain) ?? 0,
        snow: toNumber(row.snow) ?? 0,
      };
    });
  }
}
