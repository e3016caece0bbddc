// SPDX-License-Identifier: Apache-2.0
import type { ProviderHealth } from "@parcelwatch/common";
import type { CarrierCandidate, StatusNorm, TrackingKey } from "./api.ts";
import { requestJson } from "./http.ts";
import { isRecord, readPath } from "./normalize/fields.ts";
import { ProviderError } from "./provider.ts";
import type { PayloadShape, RawPayload, TrackProvider } from "./provider.ts";

const SEVENTEENTRACK_BASE_URL = "https://api.17track.net/track/v1";

// "already registered" on /register
const ALREADY_REGISTERED = -18019901;

// ─── Status mapping ───────────────────────────────────────────────────────────

// v1 package status (`track.b`). 0 means "not found" and maps to nothing.
const CODE_MAP: Record<number, StatusNorm> = {
  10: "INFO_RECEIVED",
  20: "IN_TRANSIT",
  30: "OUT_FOR_DELIVERY",
  35: "EXCEPTION",
  40: "DELIVERED",
  50: "EXCEPTION",
  60: "EXPIRED",
};

// v2 `latest_status.status` and per-event `stage`
const STAGE_MAP: Record<string, StatusNorm> = {
  InfoReceived: "INFO_RECEIVED",
  InTransit: "IN_TRANSIT",
  OutForDelivery: "OUT_FOR_DELIVERY",
  AvailableForPickup: "OUT_FOR_DELIVERY",
  DeliveryFailure: "EXCEPTION",
  Delivered: "DELIVERED",
  Exception: "EXCEPTION",
  Expired: "EXPIRED",
};

function fromCode(value: unknown): StatusNorm | undefined {
  if (typeof value !== "number" && typeof value !== "string") return undefined;
  if (value === "") return undefined;
  const code = Number(value);
  return Number.isInteger(code) ? CODE_MAP[code] : undefined;
}

function fromStage(value: unknown): StatusNorm | undefined {
  return typeof value === "string" ? STAGE_MAP[value] : undefined;
}

// ─── Payload shape ────────────────────────────────────────────────────────────

export const seventeenTrackShape: PayloadShape = {
  eventSources(data) {
    const providers = readPath(data, ["track_info", "tracking", "providers"]);
    const providerEvents = Array.isArray(providers)
      ? providers.map((p) => readPath(p, ["events"]))
      : [];
    return [
      readPath(data, ["track", "z0"]),
      readPath(data, ["track", "z1"]),
      readPath(data, ["track", "z2"]),
      readPath(data, ["track_info", "latest_event"]),
      ...providerEvents,
    ];
  },
  statusFields: ["z", "description", "status"],
  timeFields: ["a", "time_iso", "time_utc", "time"],
  locationFields: ["c", "location"],
  statusCode(entry, data, isLatest) {
    const stage = fromStage(entry.stage);
    if (stage) return stage;
    if (!isLatest) return undefined;
    return (
      fromCode(readPath(data, ["track", "b"])) ??
      fromStage(readPath(data, ["track_info", "latest_status", "status"]))
    );
  },
};

// ─── SeventeenTrackClient ─────────────────────────────────────────────────────

export interface SeventeenTrackOptions {
  apiKey: string;
  baseUrl?: string;
  /** Per-request timeout. Default: 15 000 ms */
  timeoutMs?: number;
}

function carrierId(code: string): number {
  return /^\d+$/.test(code) ? Number(code) : 0;
}

function accepted(body: unknown): Record<string, unknown>[] {
  const list = readPath(body, ["data", "accepted"]);
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

function rejected(body: unknown): Record<string, unknown>[] {
  const list = readPath(body, ["data", "rejected"]);
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

export class SeventeenTrackClient implements TrackProvider {
  readonly name = "17track" as const;
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: SeventeenTrackOptions) {
    if (!options.apiKey) {
      throw new ProviderError("17TRACK API key is not configured", "not_configured");
    }
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? SEVENTEENTRACK_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  private post(path: string, payload: unknown) {
    return requestJson(
      "17TRACK",
      `${this.baseUrl}${path}`,
      {
        method: "POST",
        headers: { "17token": this.apiKey, "Content-Type": "application/json" },
        body: JSON.stringify(payload),
      },
      this.timeoutMs,
    );
  }

  async healthCheck(): Promise<ProviderHealth> {
    const start = Date.now();
    try {
      const resp = await this.post("/gettrackinfo", []);
      const ok = resp.ok && readPath(resp.body, ["code"]) === 0;
      return {
        ok,
        latency_ms: Date.now() - start,
        message: ok ? undefined : `17TRACK answered ${resp.status}`,
      };
    } catch (err) {
      return {
        ok: false,
        latency_ms: Date.now() - start,
        message: err instanceof Error ? err.message : String(err),
      };
    }
  }

  // 17TRACK v1 has no detection endpoint; the adapter falls back to signatures.
  async detect(): Promise<CarrierCandidate[]> {
    return [];
  }

  async register(key: TrackingKey): Promise<boolean> {
    const resp = await this.post("/register", [
      { number: key.tracking_number, carrier: carrierId(key.carrier_code) },
    ]);
    if (!resp.ok) {
      throw new ProviderError(`17TRACK register error: ${resp.status}`, "provider_unavailable");
    }
    if (readPath(resp.body, ["code"]) !== 0) return false;

    if (accepted(resp.body).some((item) => item.number === key.tracking_number)) return true;

    return rejected(resp.body).some((item) => {
      if (item.number !== key.tracking_number) return false;
      const code = readPath(item, ["error", "code"]);
      const message = readPath(item, ["error", "message"]);
      return code === ALREADY_REGISTERED || (typeof message === "string" && /already/i.test(message));
    });
  }

  async fetch(keys: TrackingKey[]): Promise<RawPayload[]> {
    if (keys.length === 0) return [];
    const resp = await this.post(
      "/gettrackinfo",
      keys.map((k) => ({ number: k.tracking_number, carrier: carrierId(k.carrier_code) })),
    );
    if (!resp.ok) {
      throw new ProviderError(`17TRACK gettrackinfo error: ${resp.status}`, "provider_unavailable");
    }
    if (!isRecord(resp.body) || resp.body.code !== 0) {
      throw new ProviderError("17TRACK gettrackinfo returned an error code", "provider_unavailable");
    }

    const payloads: RawPayload[] = [];
    for (const item of accepted(resp.body)) {
      if (typeof item.number !== "string") continue;
      payloads.push({ provider: "17track", number: item.number, data: item });
    }
    return payloads;
  }
}
