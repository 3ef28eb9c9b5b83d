/**
 * Unit tests for the storage backends and the snapshot sink.
 */
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, test, expect } from "vitest";

import { SinkError } from "../src/core/exceptions.js";
import type { StorageBackend } from "../src/storage/backend.js";
import { DiskStorage } from "../src/storage/disk.js";
import { S3Storage } from "../src/storage/s3.js";
import { formatRunTimestamp, SnapshotSink } from "../src/storage/sink.js";
import { makeTmpDir } from "./fixtures.js";

const AT = new Date("2024-01-02T03:04:05Z");
const TABLE = {
  columns: ["date", "name"],
  rows: [{ date: "2024-12-25", name: "Christmas Day" }],
};

describe("DiskStorage", () => {
  test("write creates parent directories", async () => {
    const dir = makeTmpDir();
    const s = new DiskStorage(join(dir, "store"));
    await s.write("a/b.txt", "hello");
    expect(readFileSync(join(dir, "store", "a", "b.txt"), "utf8")).toBe("hello");
  });

  test("uri is the absolute file path", () => {
    const dir = makeTmpDir();
    const s = new DiskStorage(join(dir, "store"));
    expect(s.uri("x/y.csv")).toBe(join(dir, "store", "x", "y.csv"));
  });
});

describe("S3Storage", () => {
  test("uri carries the bucket and normalised prefix", () => {
    const s = new S3Storage({ bucket: "raw", prefix: "etl", region: "eu-west-2" });
    expect(s.uri("holidays/raw/a.csv")).toBe("s3://raw/etl/holidays/raw/a.csv");
  });
});

describe("SnapshotSink", () => {
  test("formatRunTimestamp uses UTC and file-safe separators", () => {
    expect(formatRunTimestamp(AT)).toBe("2024-01-02 03-04-05");
  });

  test("resolves the path template", () => {
    const sink = new SnapshotSink(
      new DiskStorage(makeTmpDir()),
      "{pipeline}/{marker}/{timestamp}.csv",
      "holidays",
    );
    expect(sink.resolveKey("raw", AT)).toBe("holidays/raw/2024-01-02 03-04-05.csv");
    expect(sink.resolveKey("clean", AT)).toBe("holidays/clean/2024-01-02 03-04-05.csv");
  });

  test("writes CSV and returns the location", async () => {
    const dir = makeTmpDir();
    const sink = new SnapshotSink(
      new DiskStorage(dir),
      "exports/{marker}-{timestamp}.csv",
      "holidays",
    );
    const location = await sink.write("clean", TABLE, AT);
    expect(location).toBe(join(dir, "exports", "clean-2024-01-02 03-04-05.csv"));
    expect(readFileSync(location, "utf8")).toBe("date,name\n2024-12-25,Christmas Day");
  });

  test("a backend failure is a SinkError naming the path", async () => {
    const failing: StorageBackend = {
      write: async () => {
        throw new Error("disk full");
      },
      uri: (key) => `mem://${key}`,
    };
    const sink = new SnapshotSink(failing, "{pipeline}/{marker}/{timestamp}.csv", "holidays");
    const err = await sink.write("raw", TABLE, AT).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SinkError);
    expect(err).toMatchObject({ path: "mem://holidays/raw/2024-01-02 03-04-05.csv" });
  });
});
