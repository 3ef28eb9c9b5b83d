/**
 * Helpers shared by the pipeline strategies.
 */
import { z } from "zod";

import { coerceValue, isMissing } from "../clean/coerce.js";
import { FetchError } from "../core/exceptions.js";
import { formatIssues, type Settings } from "../core/settings.js";
import type { CellValue } from "../core/types.js";
import { expandTemplate, type Endpoint, type QueryValue } from "../fetch/adapter.js";

export const CitySchema = z.object({
  name: z.string().min(1),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export type City = z.infer<typeof CitySchema>;

export const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Validate a decoded response body.
 * @throws FetchError of kind `permanent` when the body has the wrong shape.
 */
export function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  url: string,
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new FetchError(
      "permanent",
      url,
      `unexpected response shape: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/** The settings endpoint with extra placeholder and query values merged in. */
export function endpointFor(
  settings: Settings,
  params: Record<string, QueryValue> = {},
  query: Record<string, QueryValue> = {},
): Endpoint & { resolved: string } {
  const merged = { ...settings.endpoint.params, ...params };
  return {
    url: settings.endpoint.url,
    params: merged,
    query: { ...settings.endpoint.query, ...query },
    resolved: expandTemplate(settings.endpoint.url, merged),
  };
}

/** Read a cell as a number, or null. */
export function toNumber(cell: CellValue | undefined): number | null {
  if (cell === undefined || isMissing(cell)) return null;
  const coerced = coerceValue(cell, "FLOAT");
  return coerced.ok && typeof coerced.value === "number" ? coerced.value : null;
}

export function kelvinToCelsius(kelvin: number, digits: number): number {
  const scale = 10 ** digits;
  return Math.round((kelvin - 273.15) * scale) / scale;
}
