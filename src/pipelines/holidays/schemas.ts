/**
 * Zod schemas for the public-holiday API and the pipeline's parameters.
 */
import { z } from "zod";

export const PublicHolidaySchema = z
  .object({
    date: z.string(),
    localName: z.string().nullable().optional(),
    name: z.string(),
    countryCode: z.string().optional(),
    counties: z.array(z.string()).nullable().optional(),
  })
  .passthrough();

export const PublicHolidaysResponseSchema = z.array(PublicHolidaySchema);

export const HolidaysParametersSchema = z
  .object({
    startYear: z.number().int().min(1900),
    endYear: z.number().int().min(1900).optional(),
    countryCode: z.string().length(2).default("GB"),
    /** Holidays listing counties are kept only when this one is among them. */
    subdivision: z.string().default("GB-ENG"),
    /** English names kept whatever their counties. */
    alwaysInclude: z.array(z.string()).default(["Saint Patrick's Day"]),
  })
  .refine((p) => p.endYear === undefined || p.startYear <= p.endYear, {
    message: "startYear is after endYear",
    path: ["startYear"],
  });

/** After resolution `endYear` is always set. */
export const ResolvedHolidaysParametersSchema = z.object({
  startYear: z.number().int(),
  endYear: z.number().int(),
  countryCode: z.string(),
  subdivision: z.string(),
  alwaysInclude: z.array(z.string()),
});

export const CountiesSchema = z.array(z.string()).nullable();

export type PublicHoliday = z.infer<typeof PublicHolidaySchema>;
export type HolidaysParameters = z.infer<typeof ResolvedHolidaysParametersSchema>;
