/**
 * Leeds city-centre footfall: every CSV resource in the catalogue listing,
 * one file per period, with column names that drift between files.
 */
import { coerceValue, isMissing } from "../../clean/coerce.js";
import type {
  Extraction,
  ExtractionStrategy,
  TransformStrategy,
} from "../../core/etl.js";
import type { Logger } from "../../core/logger.js";
import type { Settings } from "../../core/settings.js";
import type { CellValue, Row } from "../../core/types.js";
import type { FetchAdapter } from "../../fetch/adapter.js";
import { endpointFor, parseResponse } from "../shared.js";
import { CatalogueResponseSchema, LeedsParametersSchema } from "./schemas.js";

const HOUR = /^([0-9]{1,2})(?:\.|:|$)/;

/** `9`, `09`, `09:00`, `9.00` → `09:00:00`; null when unrecognised. */
export function normaliseHour(cell: CellValue | undefined): string | null {
  if (cell === undefined || isMissing(cell)) return null;
  const match = HOUR.exec(String(cell).trim());
  const hour = match?.[1];
  if (hour === undefined || Number(hour) > 23) return null;
  return `${hour.padStart(2, "0")}:00:00`;
}

function firstPresent(row: Row, columns: string[]): CellValue {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && !isMissing(value)) return value;
  }
  return null;
}

export class LeedsExtractionStrategy implements ExtractionStrategy {
  resolveParameters(raw: Record<string, unknown>): Record<string, unknown> {
    return LeedsParametersSchema.parse(raw);
  }

  async extract(settings: Settings, fetcher: FetchAdapter, log: Logger): Promise<Extraction> {
    const { downloadUrl, excludeFiles } = LeedsParametersSchema.parse(settings.parameters);
    const listingEndpoint = endpointFor(settings);
    const body = await fetcher.fetchJson(listingEndpoint);
    const listing = parseResponse(CatalogueResponseSchema, body, listingEndpoint.resolved);

    const files: string[] = [];
    const records: Row[] = [];
    for (const [key, resource] of Object.entries(listing.resources)) {
      if (resource.format.toLowerCase() !== "csv") continue;
      const fileName = resource.url.split("/").pop() ?? "";
      if (fileName === "" || excludeFiles.includes(fileName)) continue;

      const table = await fetcher.fetchCsv({
        url: downloadUrl,
        params: { key, fileName: decodeURIComponent(fileName) },
      });
      log.info(`${fileName}: ${table.rows.length} rows`);
      files.push(fileName);
      records.push(...table.rows);
    }

    return { response: { listing: body, files }, records };
  }
}

export class LeedsTransformStrategy implements TransformStrategy {
  reshape(rows: Row[], settings: Settings, log: Logger): Row[] {
    const { city, locationColumns, footfallColumns } = LeedsParametersSchema.parse(
      settings.parameters,
    );
    const out: Row[] = [];
    const unrecognised: string[] = [];
    for (const row of rows) {
      // Rows without an hour are daily totals.
      if (row.Hour === undefined || isMissing(row.Hour)) continue;
      const hour = normaliseHour(row.Hour);
      if (hour === null) {
        unrecognised.push(String(row.Hour));
        continue;
      }
      const date = coerceValue(row.Date ?? null, "DATE");
      out.push({
        city,
        footfall_location: firstPresent(row, locationColumns),
        timestamp: date.ok ? `${String(date.value)} ${hour}` : null,
        total_footfall: firstPresent(row, footfallColumns),
      });
    }
    if (unrecognised.length > 0) {
      const sample = [...new Set(unrecognised)].slice(0, 5).map((h) => JSON.stringify(h));
      log.warn(`${unrecognised.length} rows with an unrecognised hour dropped (${sample.join(", ")})`);
    }
    return out;
  }
}
