/**
 * S3-compatible storage backend using the AWS SDK v3.
 *
 * Works with AWS S3 and GCS (via GCS's S3-compatible XML API with HMAC keys).
 */
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { StorageBackend } from "./backend.js";

export interface S3StorageConfig {
  endpoint?: string;
  bucket: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  region?: string;
  prefix?: string;
  forcePathStyle?: boolean;
}

export class S3Storage implements StorageBackend {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3StorageConfig, client?: S3Client) {
    this.client =
      client ??
      new S3Client({
        endpoint: config.endpoint,
        region: config.region ?? "auto",
        forcePathStyle: config.forcePathStyle,
        // Without explicit keys the SDK's default credential chain applies
        credentials:
          config.accessKeyId && config.secretAccessKey
            ? {
                accessKeyId: config.accessKeyId,
                secretAccessKey: config.secretAccessKey,
              }
            : undefined,
      });
    this.bucket = config.bucket;
    this.prefix = config.prefix ? config.prefix.replace(/\/$/, "") + "/" : "";
  }

  private fullKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.fullKey(key),
        Body: data,
        ContentType: key.endsWith(".csv") ? "text/csv" : undefined,
      }),
    );
  }

  uri(key: string): string {
    return `s3://${this.bucket}/${this.fullKey(key)}`;
  }
}
