/**
 * Zod schemas for the climate-forecast and hourly-history weather APIs.
 */
import { z } from "zod";

import { CitySchema, ISO_DATE } from "../shared.js";

export const ForecastDaySchema = z
  .object({
    dt: z.number(),
    temp: z.object({ min: z.number(), max: z.number() }).passthrough(),
    pressure: z.number(),
    humidity: z.number(),
    clouds: z.number().optional(),
    speed: z.number(),
    rain: z.number().optional(),
    snow: z.number().optional(),
  })
  .passthrough();

export const ForecastResponseSchema = z
  .object({ list: z.array(ForecastDaySchema) })
  .passthrough();

export const HistoricHourSchema = z
  .object({
    dt: z.number(),
    main: z.object({ temp: z.number(), pressure: z.number(), humidity: z.number() }).passthrough(),
    clouds: z.object({ all: z.number() }).passthrough().optional(),
    wind: z.object({ speed: z.number() }).passthrough(),
    rain: z.object({ "1h": z.number().optional() }).passthrough().optional(),
    snow: z.object({ "1h": z.number().optional() }).passthrough().optional(),
  })
  .passthrough();

export const HistoricResponseSchema = z
  .object({ list: z.array(HistoricHourSchema) })
  .passthrough();

export const ForecastParametersSchema = z.object({
  cities: z.array(CitySchema).min(1),
  /** Days of forecast to request. */
  days: z.number().int().min(1).max(30).default(16),
});

export const HistoricParametersSchema = z.object({
  cities: z.array(CitySchema).min(1),
  /** Day to fetch; yesterday (UTC) when absent. */
  date: z.string().regex(ISO_DATE, "must be YYYY-MM-DD").optional(),
});

export const ResolvedHistoricParametersSchema = HistoricParametersSchema.extend({
  date: z.string().regex(ISO_DATE),
});

export type ForecastParameters = z.infer<typeof ForecastParametersSchema>;
export type HistoricParameters = z.infer<typeof ResolvedHistoricParametersSchema>;
