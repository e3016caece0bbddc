// SPDX-License-Identifier: Apache-2.0
import { createHash } from "node:crypto";
import type { CanonicalEvent } from "./api.ts";

/**
 * Stable digest of what a subscriber can observe about an event.
 * SHA-1 over `status_raw|timestamp-or-"none"|location-or-""`.
 */
export function fingerprint(event: Pick<CanonicalEvent, "status_raw" | "timestamp" | "location">): string {
  const material = `${event.status_raw}|${event.timestamp ?? "none"}|${event.location ?? ""}`;
  return createHash("sha1").update(material).digest("hex");
}

/** A shipment that never had a fingerprint always counts as changed. */
export function hasChanged(previous: string | null | undefined, next: string): boolean {
  if (!previous) return true;
  return previous !== next;
}
