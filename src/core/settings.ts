/**
 * Settings document: schema, validation and loading.
 *
 * The document is validated once, at the start of a run. Anything wrong with
 * it is a ConfigError raised before any network call.
 */
import { readFile } from "node:fs/promises";
import { z } from "zod";

import { COLUMN_TYPES, coerceValue, isMissing } from "../clean/coerce.js";
import { ConfigError } from "./exceptions.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TABLE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ColumnSchemaSchema = z.object({
  name: z.string().regex(IDENTIFIER, "must be a plain identifier"),
  type: z.enum(COLUMN_TYPES),
  mode: z.enum(["NULLABLE", "REQUIRED"]).default("NULLABLE"),
  /** Raw fields to read, in order of preference, before the column's own name. */
  source: z.array(z.string().min(1)).optional(),
  /** Fills a missing value. */
  default: CellValueSchema.optional(),
});

const EndpointSchema = z.object({
  url: z.string().min(1),
  params: z.record(z.union([z.string(), z.number()])).default({}),
  query: z.record(z.union([z.string(), z.number()])).default({}),
  format: z.enum(["json", "csv"]).default("json"),
  /** Environment variable holding an API key, sent as the `apiKeyParam` query parameter. */
  apiKeyEnv: z.string().min(1).optional(),
  apiKeyParam: z.string().min(1).default("appid"),
});

const FetchSettingsSchema = z.object({
  retries: z.number().int().min(0).default(3),
  timeoutMs: z.number().int().positive().default(30_000),
  retryDelayMs: z.number().int().min(0).default(1_000),
});

const ValidRangeSchema = z.object({
  column: z.string().optional(),
  from: z.string().regex(ISO_DATE, "must be YYYY-MM-DD"),
  to: z.string().regex(ISO_DATE, "must be YYYY-MM-DD"),
});

const StorageSettingsSchema = z.object({
  bucket: z.string().min(1),
  pathTemplate: z
    .string()
    .default("{pipeline}/{marker}/{timestamp}.csv")
    .refine((t) => t.includes("{timestamp}") && t.includes("{marker}"), {
      message: "must contain {marker} and {timestamp}",
    }),
});

const WarehouseSettingsSchema = z.object({
  table: z.string().regex(TABLE_IDENTIFIER, "must be <dataset>.<table> or <table>"),
  writeMode: z.enum(["append", "replace"]).default("append"),
  /** Name of a YYYY-MM-DD parameter whose value suffixes the table as `_yyyymmdd`. */
  shardBy: z.string().optional(),
  /** Cumulative table upserted by primary key after each load. */
  historyTable: z
    .string()
    .regex(TABLE_IDENTIFIER, "must be <dataset>.<table> or <table>")
    .optional(),
  retries: z.number().int().min(0).default(3),
  retryDelayMs: z.number().int().min(0).default(1_000),
  timeoutMs: z.number().int().positive().default(60_000),
});

export const SettingsSchema = z
  .object({
    pipeline: z.string().min(1),
    description: z.string().optional(),
    endpoint: EndpointSchema,
    fetch: FetchSettingsSchema.default({}),
    schema: z.array(ColumnSchemaSchema).min(1),
    primaryKey: z.array(z.string()).default([]),
    validRange: ValidRangeSchema.optional(),
    mode: z.enum(["strict", "lenient"]).default("lenient"),
    storage: StorageSettingsSchema,
    warehouse: WarehouseSettingsSchema,
    parameters: z.record(z.unknown()).default({}),
  })
  .superRefine((s, ctx) => {
    const byName = new Map(s.schema.map((c) => [c.name, c]));
    if (byName.size !== s.schema.length) {
      ctx.addIssue({ code: "custom", path: ["schema"], message: "duplicate column name" });
    }

    s.schema.forEach((col, i) => {
      if (col.default === undefined || isMissing(col.default)) return;
      if (!coerceValue(col.default, col.type).ok) {
        ctx.addIssue({
          code: "custom",
          path: ["schema", i, "default"],
          message: `default is not a valid ${col.type}`,
        });
      }
    });

    s.primaryKey.forEach((key, i) => {
      if (!byName.has(key)) {
        ctx.addIssue({
          code: "custom",
          path: ["primaryKey", i],
          message: `"${key}" is not a declared column`,
        });
      }
    });

    if (s.validRange) {
      const column = s.validRange.column
        ? byName.get(s.validRange.column)
        : s.schema.find((c) => c.type === "DATE" || c.type === "TIMESTAMP");
      if (!column) {
        ctx.addIssue({
          code: "custom",
          path: ["validRange", "column"],
          message: "no declared DATE or TIMESTAMP column to filter on",
        });
      } else if (column.type !== "DATE" && column.type !== "TIMESTAMP") {
        ctx.addIssue({
          code: "custom",
          path: ["validRange", "column"],
          message: `"${column.name}" is not a DATE or TIMESTAMP column`,
        });
      }
      if (s.validRange.from > s.validRange.to) {
        ctx.addIssue({
          code: "custom",
          path: ["validRange"],
          message: "from is after to",
        });
      }
    }

    if (s.warehouse.historyTable && s.primaryKey.length === 0) {
      ctx.addIssue({
        code: "custom",
        path: ["warehouse", "historyTable"],
        message: "a history table needs a primaryKey",
      });
    }
  });

export type Settings = z.infer<typeof SettingsSchema>;
export type ColumnSchema = z.infer<typeof ColumnSchemaSchema>;
export type ValidRange = z.infer<typeof ValidRangeSchema>;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Render zod issues as `path: message` lines. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

/** Validate an already-parsed settings document. */
export function parseSettings(raw: unknown): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/** Read and validate a settings document from disk. */
export async function readSettings(path: string): Promise<Settings> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read settings file ${path}: ${String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`settings file ${path} is not valid JSON: ${String(err)}`);
  }
  return parseSettings(raw);
}

/** The column the date window applies to, if one is declared. */
export function rangeColumn(settings: Settings): ColumnSchema | undefined {
  const range = settings.validRange;
  if (!range) return undefined;
  return range.column
    ? settings.schema.find((c) => c.name === range.column)
    : settings.schema.find((c) => c.type === "DATE" || c.type === "TIMESTAMP");
}
