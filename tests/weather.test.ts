import { describe, test, expect } from "vitest";

import { cleanRecords } from "../src/clean/rules.js";
import { defaultSettingsPath } from "../src/config.js";
import { silentLogger } from "../src/core/logger.js";
import { readSettings, type Settings } from "../src/core/settings.js";
import { FetchAdapter } from "../src/fetch/adapter.js";
import { kelvinToCelsius } from "../src/pipelines/shared.js";
import {
  ForecastExtractionStrategy,
  ForecastTransformStrategy,
} from "../src/pipelines/weather/forecast.js";
import {
  HistoricExtractionStrategy,
  HistoricTransformStrategy,
} from "../src/pipelines/weather/historic.js";
import { ok, stubHttp } from "./fixtures.js";

const LEEDS = { name: "Leeds", lat: 53.8, lon: -1.55 };

async function shipped(
  pipeline: "forecast" | "historic",
  parameters: Record<string, unknown>,
): Promise<Settings> {
  const settings = await readSettings(defaultSettingsPath(pipeline));
  return { ...settings, parameters };
}

function fetcherFor(handler: Parameters<typeof stubHttp>[0]) {
  const { http, calls } = stubHttp(handler);
  const fetcher = new FetchAdapter(http, {
    retries: 0,
    timeoutMs: 1000,
    retryDelayMs: 0,
    defaultQuery: { appid: "test-secret" },
  });
  return { fetcher, calls };
}

describe("kelvinToCelsius", () => {
  test("rounds to the given digits", () => {
    expect(kelvinToCelsius(273.15, 2)).toBe(0);
    expect(kelvinToCelsius(283.15, 1)).toBe(10);
    expect(kelvinToCelsius(300, 2)).toBe(26.85);
  });
});

describe("forecast", () => {
  test("requests each city and tags its records", async () => {
    const { fetcher, calls } = fetcherFor(() =>
      ok({
        city: { name: "ignored" },
        list: [
          {
            dt: 1704110400,
            temp: { min: 275.15, max: 280.15 },
            pressure: 1012,
            humidity: 80,
            speed: 4.5,
            rain: 1.2,
          },
        ],
      }),
    );
    const settings = await shipped("forecast", { cities: [LEEDS], days: 7 });

    const { records } = await new ForecastExtractionStrategy().extract(
      settings,
      fetcher,
      silentLogger,
    );

    expect(calls).toEqual([
      {
        url: "https://pro.openweathermap.org/data/2.5/forecast/climate",
        params: { appid: "test-secret", lat: 53.8, lon: -1.55, cnt: 7 },
      },
    ]);
    expect(records).toEqual([
      {
        city: "Leeds",
        dt: 1704110400,
        "temp.min": 275.15,
        "temp.max": 280.15,
        pressure: 1012,
        humidity: 80,
        speed: 4.5,
        rain: 1.2,
      },
    ]);
  });

  test("days defaults to 16", () => {
    expect(new ForecastExtractionStrategy().resolveParameters({ cities: [LEEDS] })).toEqual({
      cities: [LEEDS],
      days: 16,
    });
  });

  test("transform converts Kelvin and fills missing precipitation", async () => {
    const settings = await shipped("forecast", { cities: [LEEDS], days: 16 });
    const reshaped = new ForecastTransformStrategy().reshape([
      {
        city: "Leeds",
        dt: 1704110400,
        "temp.min": 275.15,
        "temp.max": 280.15,
        pressure: 1012,
        humidity: 80,
        speed: 4.5,
        rain: 1.2,
      },
    ]);
    expect(reshaped).toEqual([
      {
        city: "Leeds",
        date: 1704110400,
        min_temp: 2,
        max_temp: 7,
        pressure: 1012,
        humidity: 80,
        clouds: null,
        wind: 4.5,
        rain: 1.2,
        snow: 0,
      },
    ]);

    const { table } = cleanRecords(reshaped, settings);
    expect(table.rows[0]).toMatchObject({ city: "Leeds", date: "2024-01-01" });
  });
});

describe("historic", () => {
  test("date defaults to yesterday in UTC", () => {
    expect(
      new HistoricExtractionStrategy().resolveParameters(
        { cities: [LEEDS] },
        new Date("2024-03-02T01:00:00Z"),
      ),
    ).toEqual({ cities: [LEEDS], date: "2024-03-01" });
  });

  test("requests 24 hours from midnight of the date", async () => {
    const { fetcher, calls } = fetcherFor(() =>
      ok({
        list: [
          {
            dt: 1709251200,
            main: { temp: 283.15, pressure: 1000, humidity: 90 },
            clouds: { all: 75 },
            wind: { speed: 3.1 },
          },
        ],
      }),
    );
    const settings = await shipped("historic", { cities: [LEEDS], date: "2024-03-01" });

    const { records } = await new HistoricExtractionStrategy().extract(
      settings,
      fetcher,
      silentLogger,
    );

    expect(calls[0]?.params).toEqual({
      appid: "test-secret",
      lat: 53.8,
      lon: -1.55,
      type: "hour",
      start: 1709251200,
      cnt: 24,
    });
    expect(records).toEqual([
      {
        city: "Leeds",
        dt: 1709251200,
        "main.temp": 283.15,
        "main.pressure": 1000,
        "main.humidity": 90,
        "clouds.all": 75,
        "wind.speed": 3.1,
      },
    ]);
  });

  test("transform keys each hour by its timestamp", async () => {
    const settings = await shipped("historic", { cities: [LEEDS], date: "2024-03-01" });
    const reshaped = new HistoricTransformStrategy().reshape([
      {
        city: "Leeds",
        dt: 1709251200,
        "main.temp": 283.15,
        "main.pressure": 1000,
        "main.humidity": 90,
        "clouds.all": 75,
        "wind.speed": 3.1,
        "rain.1h": 0.4,
      },
    ]);
    expect(reshaped).toEqual([
      {
        city: "Leeds",
        date: 1709251200,
        temp: 10,
        pressure: 1000,
        humidity: 90,
        clouds: 75,
        wind: 3.1,
        rain: 0.4,
        snow: 0,
      },
    ]);

    const { table } = cleanRecords(reshaped, settings);
    expect(table.rows).toEqual([
      {
        city: "Leeds",
        date: "2024-03-01 00:00:00",
        temp: 10,
        pressure: 1000,
        humidity: 90,
        clouds: 75,
        wind: 3.1,
        rain: 0.4,
        snow: 0,
      },
    ]);
  });
});
