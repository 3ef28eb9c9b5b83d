/**
 * Runtime configuration validation and backend factory.
 */
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ConfigError } from "./core/exceptions.js";
import { formatIssues } from "./core/settings.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import type { StorageFactory } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { S3Storage } from "./storage/s3.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("disk"),
    /** Each bucket is a directory under this path. */
    path: z.string().min(1).default("./data"),
  }),
  z.object({
    provider: z.literal("s3"),
    endpoint: z.string().url().optional(),
    region: z.string().optional(),
    prefix: z.string().optional(),
    forcePathStyle: z.boolean().optional(),
  }),
]);

const WarehouseConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("sqlite"),
    path: z.string().min(1).default("./warehouse.db"),
  }),
  z.object({
    provider: z.literal("postgres"),
    url: z.string().min(1),
  }),
]);

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({ provider: "disk" }),
  warehouse: WarehouseConfigSchema.default({ provider: "sqlite" }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type WarehouseConfig = z.infer<typeof WarehouseConfigSchema>;

export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/** Build the configuration from `ETL_*` environment variables. */
export function configFromEnv(env: Record<string, string | undefined>): Config {
  const storageProvider = env.ETL_STORAGE_PROVIDER ?? "disk";
  const warehouseProvider = env.ETL_WAREHOUSE_PROVIDER ?? "sqlite";
  return parseConfig({
    storage:
      storageProvider === "s3"
        ? {
            provider: "s3",
            endpoint: env.ETL_S3_ENDPOINT,
            region: env.ETL_S3_REGION,
            prefix: env.ETL_S3_PREFIX,
            forcePathStyle: env.ETL_S3_ENDPOINT ? true : undefined,
          }
        : { provider: storageProvider, path: env.ETL_STORAGE_PATH },
    warehouse:
      warehouseProvider === "postgres"
        ? { provider: "postgres", url: env.ETL_WAREHOUSE_URL }
        : { provider: warehouseProvider, path: env.ETL_WAREHOUSE_PATH },
  });
}

// ---------------------------------------------------------------------------
// Backend factories
// ---------------------------------------------------------------------------

export function buildStorageFactory(config: StorageConfig): StorageFactory {
  switch (config.provider) {
    case "disk":
      return (bucket) => new DiskStorage(join(config.path, bucket));
    case "s3":
      return (bucket) => new S3Storage({ ...config, bucket });
  }
}

export function buildDb(config: WarehouseConfig): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.path);
    case "postgres":
      return new PostgresBackend(config.url);
  }
}

/** `settings/<pipeline>.json` shipped with the package. */
export function defaultSettingsPath(pipeline: string): string {
  return fileURLToPath(new URL(`../settings/${pipeline}.json`, import.meta.url));
}
