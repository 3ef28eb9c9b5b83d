/**
 * Unit tests for value coercion.
 */
import { describe, test, expect } from "vitest";
import { coerceValue, isMissing, matchesType } from "../src/clean/coerce.js";

describe("coerceValue", () => {
  test("strings are trimmed, scalars stringified", () => {
    expect(coerceValue("  Leeds ", "STRING")).toEqual({ ok: true, value: "Leeds" });
    expect(coerceValue(12, "STRING")).toEqual({ ok: true, value: "12" });
    expect(coerceValue(false, "STRING")).toEqual({ ok: true, value: "false" });
  });

  test("integers", () => {
    expect(coerceValue("42", "INTEGER")).toEqual({ ok: true, value: 42 });
    expect(coerceValue("42.0", "INTEGER")).toEqual({ ok: true, value: 42 });
    expect(coerceValue(7, "INTEGER")).toEqual({ ok: true, value: 7 });
    expect(coerceValue("4.5", "INTEGER")).toEqual({ ok: false });
    expect(coerceValue(7.5, "INTEGER")).toEqual({ ok: false });
    expect(coerceValue("seven", "INTEGER")).toEqual({ ok: false });
  });

  test("floats", () => {
    expect(coerceValue("3.25", "FLOAT")).toEqual({ ok: true, value: 3.25 });
    expect(coerceValue("1e3", "FLOAT")).toEqual({ ok: true, value: 1000 });
    expect(coerceValue("abc", "FLOAT")).toEqual({ ok: false });
    expect(coerceValue(Number.NaN, "FLOAT")).toEqual({ ok: false });
  });

  test("booleans", () => {
    expect(coerceValue("Yes", "BOOLEAN")).toEqual({ ok: true, value: true });
    expect(coerceValue("0", "BOOLEAN")).toEqual({ ok: true, value: false });
    expect(coerceValue(true, "BOOLEAN")).toEqual({ ok: true, value: true });
    expect(coerceValue("maybe", "BOOLEAN")).toEqual({ ok: false });
  });

  test("dates keep the calendar date as written", () => {
    expect(coerceValue("2024-12-25", "DATE")).toEqual({ ok: true, value: "2024-12-25" });
    expect(coerceValue("25/12/2024", "DATE")).toEqual({ ok: true, value: "2024-12-25" });
    expect(coerceValue("2024-12-25T23:30:00+02:00", "DATE")).toEqual({
      ok: true,
      value: "2024-12-25",
    });
    expect(coerceValue("2024-02-30", "DATE")).toEqual({ ok: false });
    expect(coerceValue("Christmas", "DATE")).toEqual({ ok: false });
  });

  test("epoch numbers are seconds, or milliseconds when too large", () => {
    expect(coerceValue(1703462400, "DATE")).toEqual({ ok: true, value: "2023-12-25" });
    expect(coerceValue(1703462400000, "DATE")).toEqual({ ok: true, value: "2023-12-25" });
    expect(coerceValue(1704067200, "TIMESTAMP")).toEqual({
      ok: true,
      value: "2024-01-01 00:00:00",
    });
  });

  test("timestamps are normalised to UTC", () => {
    expect(coerceValue("2024-06-01T10:15:00+01:00", "TIMESTAMP")).toEqual({
      ok: true,
      value: "2024-06-01 09:15:00",
    });
    expect(coerceValue("2024-06-01T10:15:00Z", "TIMESTAMP")).toEqual({
      ok: true,
      value: "2024-06-01 10:15:00",
    });
    expect(coerceValue("01/06/2024 10:15", "TIMESTAMP")).toEqual({
      ok: true,
      value: "2024-06-01 10:15:00",
    });
    expect(coerceValue("2024-06-01 25:00:00", "TIMESTAMP")).toEqual({ ok: false });
  });
});

describe("isMissing", () => {
  test("absent, null and blank strings are missing", () => {
    expect(isMissing(undefined)).toBe(true);
    expect(isMissing(null)).toBe(true);
    expect(isMissing("   ")).toBe(true);
    expect(isMissing(0)).toBe(false);
    expect(isMissing(false)).toBe(false);
  });
});

describe("matchesType", () => {
  test("canonical forms only", () => {
    expect(matchesType("2024-12-25", "DATE")).toBe(true);
    expect(matchesType("2024-12-25 00:00:00", "DATE")).toBe(false);
    expect(matchesType("2024-12-25 00:00:00", "TIMESTAMP")).toBe(true);
    expect(matchesType(1.5, "INTEGER")).toBe(false);
    expect(matchesType(1.5, "FLOAT")).toBe(true);
    expect(matchesType("1", "BOOLEAN")).toBe(false);
  });
});
