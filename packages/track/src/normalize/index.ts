// SPDX-License-Identifier: Apache-2.0
import type { CanonicalEvent, NormalizedEvent } from "../api.ts";
import { fingerprint } from "../fingerprint.ts";
import type { PayloadShape, ProviderName, RawPayload } from "../provider.ts";
import { seventeenTrackShape } from "../seventeentrack.ts";
import { trackingMoreShape } from "../trackingmore.ts";
import { type EventCandidate, collectCandidates, orderNewestFirst, selectLatest } from "./events.ts";
import { normalizeStatus } from "./status.ts";
import { toIsoTimestamp } from "./timestamps.ts";

export { parseTimestamp, toIsoTimestamp } from "./timestamps.ts";
export { normalizeStatus, statusFromKeywords } from "./status.ts";

const SHAPES: Record<ProviderName, PayloadShape> = {
  "17track": seventeenTrackShape,
  trackingmore: trackingMoreShape,
};

function toEvent(
  candidate: EventCandidate,
  payload: RawPayload,
  shape: PayloadShape,
  isLatest: boolean,
): CanonicalEvent {
  return {
    status_raw: candidate.status,
    status_norm: normalizeStatus(candidate.status, shape.statusCode(candidate.entry, payload.data, isLatest)),
    timestamp: toIsoTimestamp(candidate.time),
    location: candidate.location,
    raw: candidate.entry,
  };
}

/**
 * Latest event in a vendor payload and its fingerprint. Missing or renamed
 * fields yield `{ event: null, fingerprint: "" }`; this never throws.
 */
export function normalizePayload(payload: RawPayload): NormalizedEvent {
  const shape = SHAPES[payload.provider];
  const latest = selectLatest(collectCandidates(payload.data, shape));
  if (!latest) return { event: null, fingerprint: "" };

  const event = toEvent(latest, payload, shape, true);
  return { event, fingerprint: fingerprint(event) };
}

/** Every distinct event in the payload, newest first. */
export function payloadHistory(payload: RawPayload): CanonicalEvent[] {
  const shape = SHAPES[payload.provider];
  return orderNewestFirst(collectCandidates(payload.data, shape)).map((c, i) =>
    toEvent(c, payload, shape, i === 0),
  );
}
