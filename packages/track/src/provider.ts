// SPDX-License-Identifier: Apache-2.0
import type { Provider } from "@parcelwatch/common";
import type { CarrierCandidate, StatusNorm, TrackingKey } from "./api.ts";

// ─── Raw payloads ─────────────────────────────────────────────────────────────

export const PROVIDER_NAMES = ["17track", "trackingmore"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: unknown): value is ProviderName {
  return typeof value === "string" && (PROVIDER_NAMES as readonly string[]).includes(value);
}

/**
 * One tracking number's entry exactly as the vendor returned it. Nothing about
 * `data` is trusted; normalization probes it field by field.
 */
export type RawPayload =
  | { provider: "17track"; number: string; data: Record<string, unknown> }
  | { provider: "trackingmore"; number: string; data: Record<string, unknown> };

// ─── Payload shape ────────────────────────────────────────────────────────────

/**
 * Where a vendor keeps events inside a payload and how its own status codes
 * read. Pure; used by the shared normalizer.
 */
export interface PayloadShape {
  /** Values of every field that may hold events: lists, keyed objects or single events. */
  eventSources(data: Record<string, unknown>): unknown[];
  statusFields: readonly string[];
  timeFields: readonly string[];
  locationFields: readonly string[];
  /**
   * Status implied by the vendor's code, when the code maps. Payload-level
   * codes describe the current state, so they only apply when `isLatest`.
   */
  statusCode(
    entry: Record<string, unknown>,
    data: Record<string, unknown>,
    isLatest: boolean,
  ): StatusNorm | undefined;
}

// ─── Provider interface ───────────────────────────────────────────────────────

export interface TrackProvider extends Provider {
  readonly name: ProviderName;
  /** Carrier detection endpoint. Vendors without one resolve to []. */
  detect(trackingNumber: string): Promise<CarrierCandidate[]>;
  /** True when the number is tracked afterwards, including when it already was. */
  register(key: TrackingKey): Promise<boolean>;
  /** A single request for at most one batch of keys. */
  fetch(keys: TrackingKey[]): Promise<RawPayload[]>;
}

// ─── Error ────────────────────────────────────────────────────────────────────

export type ProviderErrorCode =
  | "provider_unavailable"
  | "rate_limited"
  | "malformed_payload"
  | "not_configured"
  | "not_found"
  | "invalid_request";

export class ProviderError extends Error {
  code: ProviderErrorCode;
  retryAfter?: number;

  constructor(message: string, code: ProviderErrorCode = "provider_unavailable", retryAfter?: number) {
    super(message);
    this.name = "ProviderError";
    this.code = code;
    this.retryAfter = retryAfter;
  }
}
