// SPDX-License-Identifier: Apache-2.0
import type { PayloadShape } from "../provider.ts";
import { hasAnyField, isRecord, readText } from "./fields.ts";
import { parseTimestamp } from "./timestamps.ts";

export interface EventCandidate {
  entry: Record<string, unknown>;
  status: string;
  time: string;
  location: string | null;
}

function looksLikeEvent(entry: Record<string, unknown>, shape: PayloadShape): boolean {
  return hasAnyField(entry, shape.statusFields) || hasAnyField(entry, shape.timeFields);
}

// Lists, keyed objects of events and single event objects all flatten to entries.
function flatten(source: unknown, shape: PayloadShape, out: Record<string, unknown>[]): void {
  if (Array.isArray(source)) {
    for (const item of source) {
      if (isRecord(item)) out.push(item);
    }
    return;
  }
  if (!isRecord(source)) return;
  if (looksLikeEvent(source, shape)) {
    out.push(source);
    return;
  }
  for (const value of Object.values(source)) {
    if (isRecord(value)) out.push(value);
  }
}

/**
 * Every event-like entry in the payload, deduplicated by (raw time, raw
 * status), in discovery order.
 */
export function collectCandidates(data: Record<string, unknown>, shape: PayloadShape): EventCandidate[] {
  const entries: Record<string, unknown>[] = [];
  for (const source of shape.eventSources(data)) {
    flatten(source, shape, entries);
  }

  const seen = new Set<string>();
  const candidates: EventCandidate[] = [];
  for (const entry of entries) {
    if (!looksLikeEvent(entry, shape)) continue;
    const status = readText(entry, shape.statusFields);
    const time = readText(entry, shape.timeFields);
    const key = `${time}\u0000${status}`;
    if (seen.has(key)) continue;
    seen.add(key);
    candidates.push({
      entry,
      status,
      time,
      location: readText(entry, shape.locationFields) || null,
    });
  }
  return candidates;
}

/**
 * Candidates newest first. Ordered by parsed instant when every timestamp
 * parses, otherwise by the raw strings. Candidates without a timestamp go last.
 * The sort is stable, so equal keys keep discovery order.
 */
export function orderNewestFirst(candidates: EventCandidate[]): EventCandidate[] {
  const timed = candidates.filter((c) => c.time !== "");
  const untimed = candidates.filter((c) => c.time === "");

  const instants = new Map<EventCandidate, number>();
  for (const c of timed) {
    const parsed = parseTimestamp(c.time);
    if (parsed) instants.set(c, parsed.getTime());
  }

  const sorted =
    instants.size === timed.length
      ? [...timed].sort((a, b) => (instants.get(b) ?? 0) - (instants.get(a) ?? 0))
      : [...timed].sort((a, b) => (a.time < b.time ? 1 : a.time > b.time ? -1 : 0));

  return [...sorted, ...untimed];
}

/** Latest candidate, or undefined when there are none. */
export function selectLatest(candidates: EventCandidate[]): EventCandidate | undefined {
  return orderNewestFirst(candidates)[0];
}
