// SPDX-License-Identifier: Apache-2.0
// Field probing helpers for untrusted vendor JSON.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walk `path` through nested objects; undefined as soon as a step is missing. */
export function readPath(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** First non-empty text among `fields`. Finite numbers count as text. */
export function readText(entry: Record<string, unknown>, fields: readonly string[]): string {
  for (const field of fields) {
    const value = entry[field];
    if (typeof value === "string" && value.trim() !== "") return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return "";
}

export function hasAnyField(entry: Record<string, unknown>, fields: readonly string[]): boolean {
  return readText(entry, fields) !== "";
}
