// SPDX-License-Identifier: Apache-2.0
import { UTCDate } from "@date-fns/utc";
import { isValid, parse, parseISO } from "date-fns";

// Tried in order. Zone-less values are wall-clock UTC.
const LEADING_FORMATS = ["yyyy-MM-dd HH:mm:ss", "yyyy-MM-dd HH:mm"] as const;

const TRAILING_FORMATS = [
  "yyyy-MM-dd",
  "yyyy/MM/dd HH:mm:ss",
  "yyyy/MM/dd HH:mm",
  "dd/MM/yyyy HH:mm:ss",
  "dd/MM/yyyy HH:mm",
  "dd/MM/yyyy",
  "dd.MM.yyyy HH:mm",
  "dd.MM.yyyy",
  "MM/dd/yyyy",
] as const;

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;
const ISO_SHAPE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

// UTC reference date: the host zone never applies.
function tryFormat(value: string, format: string): Date | null {
  const parsed = parse(value, format, new UTCDate(0));
  return isValid(parsed) ? new Date(parsed.getTime()) : null;
}

/**
 * Parse a vendor timestamp to a UTC instant. Returns null when no known
 * format matches; callers must not substitute the current time.
 */
export function parseTimestamp(raw: string): Date | null {
  const value = raw.trim();
  if (!value) return null;

  for (const format of LEADING_FORMATS) {
    const parsed = tryFormat(value, format);
    if (parsed) return parsed;
  }

  if (ISO_SHAPE.test(value)) {
    const parsed = parseISO(ZONE_SUFFIX.test(value) ? value : `${value}Z`);
    if (isValid(parsed)) return parsed;
  }

  for (const format of TRAILING_FORMATS) {
    const parsed = tryFormat(value, format);
    if (parsed) return parsed;
  }

  return null;
}

/** ISO 8601 UTC string for `raw`, or null. */
export function toIsoTimestamp(raw: string): string | null {
  return parseTimestamp(raw)?.toISOString() ?? null;
}
