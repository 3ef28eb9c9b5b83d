/**
 * Value coercion to the declared column types.
 *
 * Canonical forms: DATE is `YYYY-MM-DD`, TIMESTAMP is `YYYY-MM-DD HH:MM:SS`
 * in UTC. Epoch numbers are seconds unless they are too large to be.
 */
import type { CellValue } from "../core/types.js";

export const COLUMN_TYPES = [
  "STRING",
  "INTEGER",
  "FLOAT",
  "BOOLEAN",
  "DATE",
  "TIMESTAMP",
] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export type Coerced =
  | { ok: true; value: Exclude<CellValue, null> }
  | { ok: false };

/** Timestamps above this threshold are treated as milliseconds (year 2100+). */
const MAX_SECONDS_EPOCH = 4_102_444_800;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const UK_PATTERN =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const INTEGER_PATTERN = /^[+-]?\d+(?:\.0+)?$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

const TRUE_VALUES = new Set(["true", "t", "yes", "y", "1"]);
const FALSE_VALUES = new Set(["false", "f", "no", "n", "0"]);

const CANONICAL_DATE = /^\d{4}-\d{2}-\d{2}$/;
const CANONICAL_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Offset east of UTC, in minutes. */
  offset: number;
}

/** True for absent, null and blank-string values. */
export function isMissing(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === "string" && value.trim() === "")
  );
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatDate(d: Date): string {
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

export function formatTimestamp(d: Date): string {
  return `${formatDate(d)} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

function parseOffset(raw: string | undefined): number {
  if (!raw || raw.toUpperCase() === "Z") return 0;
  const sign = raw.startsWith("-") ? -1 : 1;
  const digits = raw.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function parseParts(text: string): DateParts | null {
  const iso = ISO_PATTERN.exec(text);
  if (iso) {
    return {
      year: Number(iso[1]),
      month: Number(iso[2]),
      day: Number(iso[3]),
      hour: Number(iso[4] ?? 0),
      minute: Number(iso[5] ?? 0),
      second: Number(iso[6] ?? 0),
      offset: parseOffset(iso[7]),
    };
  }
  const uk = UK_PATTERN.exec(text);
  if (uk) {
    return {
      year: Number(uk[3]),
      month: Number(uk[2]),
      day: Number(uk[1]),
      hour: Number(uk[4] ?? 0),
      minute: Number(uk[5] ?? 0),
      second: Number(uk[6] ?? 0),
      offset: 0,
    };
  }
  return null;
}

/** Builds a UTC instant from wall-clock parts, or null when a part is out of range. */
function toInstant(p: DateParts): Date | null {
  const wall = new Date(
    Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second),
  );
  if (
    wall.getUTCFullYear() !== p.year ||
    wall.getUTCMonth() !== p.month - 1 ||
    wall.getUTCDate() !== p.day ||
    wall.getUTCHours() !== p.hour ||
    wall.getUTCMinutes() !== p.minute ||
    wall.getUTCSeconds() !== p.second
  ) {
    return null;
  }
  return new Date(wall.getTime() - p.offset * 60_000);
}

function fromEpoch(n: number): Date | null {
  if (!Number.isFinite(n)) return null;
  const seconds = n > MAX_SECONDS_EPOCH ? n / 1000 : n;
  const d = new Date(seconds * 1000);
  return Number.isNaN(d.getTime()) ? null : d;
}

function coerceDate(value: unknown): string | null {
  if (typeof value === "number") {
    const d = fromEpoch(value);
    return d ? formatDate(d) : null;
  }
  if (typeof value !== "string") return null;
  const parts = parseParts(value.trim());
  if (!parts) return null;
  // The calendar date as written at the source; the offset only matters for instants.
  const valid = toInstant({ ...parts, hour: 0, minute: 0, second: 0, offset: 0 });
  return valid ? formatDate(valid) : null;
}

function coerceTimestamp(value: unknown): string | null {
  if (typeof value === "number") {
    const d = fromEpoch(value);
    return d ? formatTimestamp(d) : null;
  }
  if (typeof value !== "string") return null;
  const parts = parseParts(value.trim());
  if (!parts) return null;
  const instant = toInstant(parts);
  return instant ? formatTimestamp(instant) : null;
}

/**
 * Coerce a non-missing value to `type`. Callers check {@link isMissing} first.
 */
export function coerceValue(value: unknown, type: ColumnType): Coerced {
  switch (type) {
    case "STRING": {
      if (typeof value === "string") return { ok: true, value: value.trim() };
      if (typeof value === "number" && Number.isFinite(value)) {
        return { ok: true, value: String(value) };
      }
      if (typeof value === "boolean") return { ok: true, value: String(value) };
      return { ok: false };
    }
    case "INTEGER": {
      const n =
        typeof value === "number"
          ? value
          : typeof value === "string" && INTEGER_PATTERN.test(value.trim())
            ? Number(value.trim())
            : NaN;
      return Number.isSafeInteger(n) ? { ok: true, value: n } : { ok: false };
    }
    case "FLOAT": {
      const n =
        typeof value === "number"
          ? value
          : typeof value === "string" && FLOAT_PATTERN.test(value.trim())
            ? Number(value.trim())
            : NaN;
      return Number.isFinite(n) ? { ok: true, value: n } : { ok: false };
    }
    case "BOOLEAN": {
      if (typeof value === "boolean") return { ok: true, value };
      const text = String(value).trim().toLowerCase();
      if (TRUE_VALUES.has(text)) return { ok: true, value: true };
      if (FALSE_VALUES.has(text)) return { ok: true, value: false };
      return { ok: false };
    }
    case "DATE": {
      const d = coerceDate(value);
      return d === null ? { ok: false } : { ok: true, value: d };
    }
    case "TIMESTAMP": {
      const ts = coerceTimestamp(value);
      return ts === null ? { ok: false } : { ok: true, value: ts };
    }
  }
}

/** Whether `value` is already in the canonical form for `type`. */
export function matchesType(value: Exclude<CellValue, null>, type: ColumnType): boolean {
  switch (type) {
    case "STRING":
      return typeof value === "string";
    case "INTEGER":
      return typeof value === "number" && Number.isSafeInteger(value);
    case "FLOAT":
      return typeof value === "number" && Number.isFinite(value);
    case "BOOLEAN":
      return typeof value === "boolean";
    case "DATE":
      return typeof value === "string" && CANONICAL_DATE.test(value);
    case "TIMESTAMP":
      return typeof value === "string" && CANONICAL_TIMESTAMP.test(value);
  }
}
