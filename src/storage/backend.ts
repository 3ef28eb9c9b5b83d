/**
 * Abstract storage backend interface.
 */

export interface StorageBackend {
  /** Write data to the given key. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Location of the key as reported to users, e.g. a file path or `s3://` URI. */
  uri(key: string): string;
}

/** Opens the backend for a settings document's bucket. */
export type StorageFactory = (bucket: string) => StorageBackend;
