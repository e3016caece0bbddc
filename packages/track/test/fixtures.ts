// SPDX-License-Identifier: Apache-2.0
import { type Logger, Metrics } from "@parcelwatch/common";
import { vi } from "vitest";
import { TrackingAdapter } from "../src/adapter.ts";
import type { CarrierCandidate, Shipment, TrackingKey } from "../src/api.ts";
import type { LimitsConfig } from "../src/config.ts";
import { SqliteShipmentStore } from "../src/db.ts";
import type { Notifier } from "../src/notify.ts";
import type { ProviderError, RawPayload, TrackProvider } from "../src/provider.ts";
import { Reconciler } from "../src/reconcile.ts";
import { type ServiceContext, createServiceContext } from "../src/service.ts";

export const NOW = Date.UTC(2025, 0, 17, 12, 0, 0);
export const MINUTE = 60_000;
export const HOUR = 60 * MINUTE;

// ─── Logger ───────────────────────────────────────────────────────────────────

export function makeLogger(): Logger {
  const logger: Logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => logger,
  };
  return logger;
}

// ─── Shipments ────────────────────────────────────────────────────────────────

export function makeShipment(overrides: Partial<Shipment> = {}): Shipment {
  return {
    id: "shp_test",
    tracking_number: "RR123456789CN",
    carrier_code: "2005",
    carrier_candidates: [],
    state: "active",
    last_event: null,
    last_event_fingerprint: null,
    last_check_at: null,
    next_check_at: NOW,
    delivered_at: null,
    created_at: NOW - HOUR,
    updated_at: NOW - HOUR,
    ...overrides,
  };
}

// ─── Payloads ─────────────────────────────────────────────────────────────────

export interface V1Event {
  a?: string;
  z?: string;
  c?: string;
}

/** 17TRACK v1 accepted entry with events in `track.z1`. */
export function v1Data(number: string, events: V1Event[], code?: number): Record<string, unknown> {
  return { number, track: { b: code, z1: events } };
}

export function v1Payload(number: string, events: V1Event[], code?: number): RawPayload {
  return { provider: "17track", number, data: v1Data(number, events, code) };
}

// ─── Fake provider ────────────────────────────────────────────────────────────

/** In-process stand-in for a vendor client. Serves payloads by tracking number. */
export class FakeProvider implements TrackProvider {
  readonly name = "17track" as const;
  payloads = new Map<string, Record<string, unknown>>();
  detected: CarrierCandidate[] = [];
  registered: TrackingKey[] = [];
  fetchCalls: TrackingKey[][] = [];
  registerResult = true;
  /** Thrown by fetch() for the listed call numbers (0-based), or every call when "all". */
  failures = new Map<number | "all", ProviderError>();

  async healthCheck() {
    return { ok: true, latency_ms: 1 };
  }

  async detect(): Promise<CarrierCandidate[]> {
    return this.detected;
  }

  async register(key: TrackingKey): Promise<boolean> {
    this.registered.push(key);
    return this.registerResult;
  }

  async fetch(keys: TrackingKey[]): Promise<RawPayload[]> {
    const call = this.fetchCalls.length;
    this.fetchCalls.push(keys);
    const failure = this.failures.get(call) ?? this.failures.get("all");
    if (failure) throw failure;

    return keys.flatMap((k): RawPayload[] => {
      const data = this.payloads.get(k.tracking_number);
      return data ? [{ provider: "17track", number: k.tracking_number, data }] : [];
    });
  }
}

// ─── Fake notifier ────────────────────────────────────────────────────────────

export class RecordingNotifier implements Notifier {
  sent: Array<{ userId: string; text: string }> = [];
  /** user ids whose delivery throws */
  throwFor = new Set<string>();
  /** user ids whose delivery returns false */
  rejectFor = new Set<string>();

  async deliver(userId: string, text: string): Promise<boolean> {
    if (this.throwFor.has(userId)) throw new Error(`chat unreachable for ${userId}`);
    if (this.rejectFor.has(userId)) return false;
    this.sent.push({ userId, text });
    return true;
  }
}

// ─── Engine ───────────────────────────────────────────────────────────────────

export interface TestEngine {
  store: SqliteShipmentStore;
  provider: FakeProvider;
  notifier: RecordingNotifier;
  logger: Logger;
  metrics: Metrics;
  reconciler: Reconciler;
  service: ServiceContext;
  /** Current time seen by every component. */
  clock: { now: number };
}

export const TEST_LIMITS: LimitsConfig = {
  maxActivePerUser: 3,
  addPerMinute: 5,
  refreshCooldownMs: 10 * MINUTE,
};

/** Store, fake vendor and service wired together on one shared clock. */
export function createTestEngine(options: { configured?: boolean; limits?: Partial<LimitsConfig> } = {}): TestEngine {
  const store = new SqliteShipmentStore(":memory:");
  const provider = new FakeProvider();
  const notifier = new RecordingNotifier();
  const logger = makeLogger();
  const metrics = new Metrics();
  const clock = { now: NOW };
  const now = () => clock.now;

  const adapter =
    options.configured === false ? null : new TrackingAdapter(provider, { batchSize: 40, logger });
  const reconciler = new Reconciler({ store, adapter, notifier, logger, metrics, now });
  const service = createServiceContext({
    store,
    reconciler,
    adapter,
    logger,
    limits: { ...TEST_LIMITS, ...options.limits },
    now,
  });

  return { store, provider, notifier, logger, metrics, reconciler, service, clock };
}
