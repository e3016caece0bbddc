// SPDX-License-Identifier: Apache-2.0
import type { ProviderHealth } from "@parcelwatch/common";
import type { CarrierCandidate, StatusNorm, TrackingKey } from "./api.ts";
import { AUTO_CARRIER } from "./api.ts";
import { requestJson } from "./http.ts";
import { isRecord, readPath } from "./normalize/fields.ts";
import { ProviderError } from "./provider.ts";
import type { PayloadShape, RawPayload, TrackProvider } from "./provider.ts";

const TRACKINGMORE_BASE_URL = "https://api.trackingmore.com/v4";

// ─── Status mapping ───────────────────────────────────────────────────────────

// Delivery status → normalized status. "notfound" maps to nothing.
const STATUS_MAP: Record<string, StatusNorm> = {
  pending: "INFO_RECEIVED",
  inforeceived: "INFO_RECEIVED",
  transit: "IN_TRANSIT",
  pickup: "OUT_FOR_DELIVERY",
  delivered: "DELIVERED",
  undelivered: "EXCEPTION",
  exception: "EXCEPTION",
  expired: "EXPIRED",
};

// Substatus codes that say more than their delivery status
const SUBSTATUS_MAP: Record<string, StatusNorm> = {
  transit002: "ARRIVED_SORTING_CENTER",
  transit003: "ARRIVED_DESTINATION",
  transit004: "ARRIVED_DESTINATION",
  transit005: "CUSTOMS",
  pickup001: "OUT_FOR_DELIVERY",
};

function mapCode(substatus: unknown, status: unknown): StatusNorm | undefined {
  const specific = typeof substatus === "string" ? SUBSTATUS_MAP[substatus] : undefined;
  if (specific) return specific;
  if (typeof status === "string") return STATUS_MAP[status.toLowerCase()];
  return undefined;
}

// ─── Payload shape ────────────────────────────────────────────────────────────

export const trackingMoreShape: PayloadShape = {
  eventSources(data) {
    return [
      readPath(data, ["origin_info", "trackinfo"]),
      readPath(data, ["destination_info", "trackinfo"]),
    ];
  },
  statusFields: ["tracking_detail", "checkpoint_delivery_status"],
  timeFields: ["checkpoint_date", "Date"],
  locationFields: ["location", "Details"],
  statusCode(entry, data, isLatest) {
    const own = mapCode(entry.checkpoint_delivery_substatus, entry.checkpoint_delivery_status);
    if (own || !isLatest) return own;
    return mapCode(data.substatus, data.delivery_status);
  },
};

// ─── TrackingMoreClient ───────────────────────────────────────────────────────

export interface TrackingMoreOptions {
  apiKey: string;
  baseUrl?: string;
  /** Per-request timeout. Default: 15 000 ms */
  timeoutMs?: number;
}

function meta(body: unknown): { code: number | undefined; message: string } {
  const code = readPath(body, ["meta", "code"]);
  const message = readPath(body, ["meta", "message"]);
  return {
    code: typeof code === "number" ? code : undefined,
    message: typeof message === "string" ? message : "",
  };
}

export class TrackingMoreClient implements TrackProvider {
  readonly name = "trackingmore" as const;
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: TrackingMoreOptions) {
    if (!options.apiKey) {
      throw new ProviderError("TrackingMore API key is not configured", "not_configured");
    }
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? TRACKINGMORE_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  private request(path: string, init: RequestInit = {}) {
    return requestJson(
      "TrackingMore",
      `${this.baseUrl}${path}`,
      {
        ...init,
        headers: { "Tracking-Api-Key": this.apiKey, "Content-Type": "application/json" },
      },
      this.timeoutMs,
    );
  }

  async healthCheck(): Promise<ProviderHealth> {
    const start = Date.now();
    try {
      const resp = await this.request("/couriers/all");
      return {
        ok: resp.ok,
        latency_ms: Date.now() - start,
        message: resp.ok ? undefined : meta(resp.body).message || `TrackingMore answered ${resp.status}`,
      };
    } catch (err) {
      return {
        ok: false,
        latency_ms: Date.now() - start,
        message: err instanceof Error ? err.message : String(err),
      };
    }
  }

  async detect(trackingNumber: string): Promise<CarrierCandidate[]> {
    const resp = await this.request("/couriers/detect", {
      method: "POST",
      body: JSON.stringify({ tracking_number: trackingNumber }),
    });
    if (!resp.ok) {
      throw new ProviderError(`TrackingMore detect error: ${resp.status}`, "provider_unavailable");
    }
    const data = readPath(resp.body, ["data"]);
    if (!Array.isArray(data)) return [];

    const candidates: CarrierCandidate[] = [];
    for (const item of data) {
      if (!isRecord(item) || typeof item.courier_code !== "string") continue;
      candidates.push({
        code: item.courier_code,
        name: typeof item.courier_name === "string" ? item.courier_name : item.courier_code,
      });
    }
    return candidates;
  }

  async register(key: TrackingKey): Promise<boolean> {
    let courier = key.carrier_code;
    if (courier === AUTO_CARRIER.code) {
      const [first] = await this.detect(key.tracking_number);
      if (!first) {
        throw new ProviderError(
          `TrackingMore could not detect a courier for ${key.tracking_number}`,
          "invalid_request",
        );
      }
      courier = first.code;
    }

    const resp = await this.request("/trackings/create", {
      method: "POST",
      body: JSON.stringify({ tracking_number: key.tracking_number, courier_code: courier }),
    });

    const { code, message } = meta(resp.body);
    // "Tracking No. already exists" means the number is tracked already
    if (/already exists/i.test(message)) return true;
    return resp.ok && code === 200;
  }

  async fetch(keys: TrackingKey[]): Promise<RawPayload[]> {
    if (keys.length === 0) return [];
    const query = new URLSearchParams({
      tracking_numbers: keys.map((k) => k.tracking_number).join(","),
    });

    const resp = await this.request(`/trackings/get?${query}`);
    if (!resp.ok) {
      throw new ProviderError(`TrackingMore GET error: ${resp.status}`, "provider_unavailable");
    }
    const data = readPath(resp.body, ["data"]);
    if (!Array.isArray(data)) {
      throw new ProviderError("TrackingMore GET returned no data list", "malformed_payload");
    }

    const payloads: RawPayload[] = [];
    for (const item of data) {
      if (!isRecord(item) || typeof item.tracking_number !== "string") continue;
      payloads.push({ provider: "trackingmore", number: item.tracking_number, data: item });
    }
    return payloads;
  }
}
