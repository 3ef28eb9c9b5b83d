/**
 * Zod schemas for the open-data footfall sources.
 */
import { z } from "zod";

/** Catalogue listing: resources keyed by id. */
export const CatalogueResponseSchema = z
  .object({
    resources: z.record(
      z.object({ format: z.string(), url: z.string() }).passthrough(),
    ),
  })
  .passthrough();

export const LeedsParametersSchema = z.object({
  /** Per-file download URL with `{key}` and `{fileName}` placeholders. */
  downloadUrl: z.string().min(1),
  excludeFiles: z.array(z.string()).default([]),
  city: z.string().default("Leeds"),
  /** Source columns tried in order for each output column. */
  locationColumns: z.array(z.string()).min(1).default(["LocationName", "Location"]),
  footfallColumns: z.array(z.string()).min(1).default(["InCount", "Count"]),
});

export const YorkParametersSchema = z.object({
  city: z.string().default("York"),
});

export type CatalogueResponse = z.infer<typeof CatalogueResponseSchema>;
export type LeedsParameters = z.infer<typeof LeedsParametersSchema>;
