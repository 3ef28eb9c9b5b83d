import { describe, test, expect, vi } from "vitest";

import { cleanRecords } from "../src/clean/rules.js";
import { defaultSettingsPath } from "../src/config.js";
import { silentLogger, type Logger } from "../src/core/logger.js";
import { readSettings, type Settings } from "../src/core/settings.js";
import { FetchAdapter } from "../src/fetch/adapter.js";
import {
  LeedsExtractionStrategy,
  LeedsTransformStrategy,
  normaliseHour,
} from "../src/pipelines/footfall/leeds.js";
import {
  YorkExtractionStrategy,
  YorkTransformStrategy,
} from "../src/pipelines/footfall/york.js";
import { ok, stubHttp, type StubHandler } from "./fixtures.js";

async function shipped(
  pipeline: "footfall-leeds" | "footfall-york",
  overrides: Partial<Settings> = {},
): Promise<Settings> {
  const settings = await readSettings(defaultSettingsPath(pipeline));
  return { ...settings, ...overrides };
}

function fetcherFor(handler: StubHandler) {
  const { http, calls } = stubHttp(handler);
  return {
    fetcher: new FetchAdapter(http, { retries: 0, timeoutMs: 1000, retryDelayMs: 0 }),
    calls,
  };
}

describe("normaliseHour", () => {
  test.each([
    ["9", "09:00:00"],
    ["09", "09:00:00"],
    ["17:00", "17:00:00"],
    ["14.00", "14:00:00"],
    [7, "07:00:00"],
  ])("%s -> %s", (input, expected) => {
    expect(normaliseHour(input)).toBe(expected);
  });

  test.each([["24"], ["Total"], [""], [null]])("%s is not an hour", (input) => {
    expect(normaliseHour(input)).toBeNull();
  });
});

describe("Leeds footfall", () => {
  const LISTING = {
    resources: {
      a: { format: "CSV", url: "https://data.example.org/files/jan%202024.csv" },
      b: { format: "csv", url: "https://data.example.org/files/old.csv" },
      c: { format: "pdf", url: "https://data.example.org/files/readme.pdf" },
    },
  };

  test("downloads every CSV resource not excluded", async () => {
    const { fetcher, calls } = fetcherFor(({ url }) =>
      url.endsWith(".csv")
        ? ok("Date,Hour,LocationName,InCount\n01/01/2024,9,Briggate,120\n")
        : ok(LISTING),
    );
    const base = await shipped("footfall-leeds");
    const settings = {
      ...base,
      parameters: { ...base.parameters, excludeFiles: ["old.csv"] },
    };

    const { response, records } = await new LeedsExtractionStrategy().extract(
      settings,
      fetcher,
      silentLogger,
    );

    expect(calls.map((c) => c.url)).toEqual([
      "https://data.example.org/api/dataset/leeds-city-centre-footfall-data",
      "https://data.example.org/download/a/jan%202024.csv",
    ]);
    expect(response).toEqual({ listing: LISTING, files: ["jan%202024.csv"] });
    expect(records).toHaveLength(1);
  });

  test("transform builds hourly timestamps and drops daily totals", async () => {
    const settings = await shipped("footfall-leeds");
    const reshaped = new LeedsTransformStrategy().reshape(
      [
        { Date: "01/01/2024", Hour: "9", LocationName: "Briggate", InCount: "120" },
        { Date: "02/01/2024", Hour: "17:00", Location: "Headrow", Count: "85" },
        { Date: "01/01/2024", Hour: null, LocationName: "Briggate", InCount: "2400" },
      ],
      settings,
      silentLogger,
    );

    expect(reshaped).toEqual([
      {
        city: "Leeds",
        footfall_location: "Briggate",
        timestamp: "2024-01-01 09:00:00",
        total_footfall: "120",
      },
      {
        city: "Leeds",
        footfall_location: "Headrow",
        timestamp: "2024-01-02 17:00:00",
        total_footfall: "85",
      },
    ]);

    const { table } = cleanRecords(reshaped, settings);
    expect(table.rows[1]).toEqual({
      city: "Leeds",
      footfall_location: "Headrow",
      timestamp: "2024-01-02 17:00:00",
      total_footfall: 85,
    });
  });

  test("unrecognised hours are dropped with a warning, daily totals quietly", async () => {
    const settings = await shipped("footfall-leeds");
    const log: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const reshaped = new LeedsTransformStrategy().reshape(
      [
        { Date: "01/01/2024", Hour: "9", LocationName: "Briggate", InCount: "120" },
        { Date: "01/01/2024", Hour: "24", LocationName: "Briggate", InCount: "7" },
        { Date: "01/01/2024", Hour: "noon", LocationName: "Briggate", InCount: "8" },
        { Date: "02/01/2024", Hour: "24", LocationName: "Headrow", InCount: "9" },
        { Date: "01/01/2024", Hour: "", LocationName: "Briggate", InCount: "2400" },
      ],
      settings,
      log,
    );

    expect(reshaped).toHaveLength(1);
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      '3 rows with an unrecognised hour dropped ("24", "noon")',
    );
  });
});

describe("York footfall", () => {
  test("reads the CSV file", async () => {
    const { fetcher, calls } = fetcherFor(() =>
      ok("Date,LocationName,InCount\n2024-05-01 10:00:00,Coney Street,310\n"),
    );
    const settings = await shipped("footfall-york");

    const { records } = await new YorkExtractionStrategy().extract(
      settings,
      fetcher,
      silentLogger,
    );

    expect(calls.map((c) => c.url)).toEqual([
      "https://data.example.org/download/york-footfall.csv",
    ]);
    expect(records).toEqual([
      { Date: "2024-05-01 10:00:00", LocationName: "Coney Street", InCount: "310" },
    ]);
  });

  test("accepts a JSON records envelope", async () => {
    const { fetcher } = fetcherFor(() =>
      ok({ records: [{ Date: "2024-05-01 10:00:00", LocationName: "Coney Street", InCount: 5 }] }),
    );
    const base = await shipped("footfall-york");
    const settings = { ...base, endpoint: { ...base.endpoint, format: "json" as const } };

    const { records } = await new YorkExtractionStrategy().extract(
      settings,
      fetcher,
      silentLogger,
    );
    expect(records).toEqual([
      { Date: "2024-05-01 10:00:00", LocationName: "Coney Street", InCount: 5 },
    ]);
  });

  test("renames columns and fills missing counts with zero", async () => {
    const settings = await shipped("footfall-york");
    const reshaped = new YorkTransformStrategy().reshape(
      [
        { Date: "2024-05-01 10:00:00", LocationName: "Coney Street", InCount: "310" },
        { Date: "2024-05-01 11:00:00", LocationName: "Parliament Street", InCount: null },
      ],
      settings,
    );
    const { table } = cleanRecords(reshaped, settings);

    expect(table).toEqual({
      columns: ["city", "footfall_location", "timestamp", "total_footfall"],
      rows: [
        {
          city: "York",
          footfall_location: "Coney Street",
          timestamp: "2024-05-01 10:00:00",
          total_footfall: 310,
        },
        {
          city: "York",
          footfall_location: "Parliament Street",
          timestamp: "2024-05-01 11:00:00",
          total_footfall: 0,
        },
      ],
    });
  });
});
