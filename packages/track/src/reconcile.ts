// SPDX-License-Identifier: Apache-2.0
import {
  type Logger,
  type Metrics,
  errorMessage,
  newRequestId,
  withRequestId,
} from "@parcelwatch/common";
import type { TrackingAdapter } from "./adapter.ts";
import type { CanonicalEvent, NormalizedEvent, Shipment } from "./api.ts";
import { hasChanged } from "./fingerprint.ts";
import { normalizePayload } from "./normalize/index.ts";
import { type FanOutResult, type Notifier, fanOut } from "./notify.ts";
import { ProviderError } from "./provider.ts";
import type { RawPayload } from "./provider.ts";
import { DEFAULT_SCHEDULE, type ScheduleConfig, nextCheckAt } from "./schedule.ts";
import type { ShipmentStore } from "./store.ts";

// ─── deriveUpdate ─────────────────────────────────────────────────────────────

export type Outcome = "changed" | "unchanged" | "no_data";

export interface DerivedUpdate {
  shipment: Shipment;
  outcome: Outcome;
}

/**
 * The next state of a shipment after one observation. Pure; both the poll
 * cycle and manual refresh go through it, so concurrent writers of the same
 * shipment always store a self-consistent row.
 */
export function deriveUpdate(
  shipment: Shipment,
  normalized: NormalizedEvent | undefined,
  now: number,
  schedule: ScheduleConfig = DEFAULT_SCHEDULE,
): DerivedUpdate {
  const archived = shipment.state === "archived";
  const checked = { ...shipment, last_check_at: now, updated_at: now };

  if (!normalized) {
    return {
      outcome: "no_data",
      shipment: { ...checked, next_check_at: archived ? null : now + schedule.noDataMs },
    };
  }

  const event = normalized.event;
  if (!event) {
    return {
      outcome: "no_data",
      shipment: { ...checked, next_check_at: archived ? null : now + schedule.noDataMs },
    };
  }

  if (!hasChanged(shipment.last_event_fingerprint, normalized.fingerprint)) {
    return {
      outcome: "unchanged",
      shipment: {
        ...checked,
        next_check_at: archived ? null : nextCheckAt(event.status_norm, now, schedule),
      },
    };
  }

  const changed: Shipment = {
    ...checked,
    last_event: event,
    last_event_fingerprint: normalized.fingerprint,
  };

  if (event.status_norm === "DELIVERED") {
    return {
      outcome: "changed",
      shipment: {
        ...changed,
        state: "archived",
        delivered_at: shipment.delivered_at ?? now,
        next_check_at: null,
      },
    };
  }

  return {
    outcome: "changed",
    shipment: {
      ...changed,
      next_check_at: archived ? null : nextCheckAt(event.status_norm, now, schedule),
    },
  };
}

// ─── Reconciler ───────────────────────────────────────────────────────────────

export interface ReconcilerDeps {
  store: ShipmentStore;
  /** Null when no provider is configured; every provider-touching call then throws not_configured. */
  adapter: TrackingAdapter | null;
  notifier: Notifier;
  logger: Logger;
  metrics?: Metrics;
  schedule?: ScheduleConfig;
  /** Most shipments per cycle. Default: 100 */
  batchCeiling?: number;
  now?: () => number;
}

export interface Observation {
  outcome: Outcome;
  shipment: Shipment;
  event: CanonicalEvent | null;
  /** Null unless the shipment changed and notification was requested. */
  notified: FanOutResult | null;
}

export interface CycleSummary {
  selected: number;
  changed: number;
  unchanged: number;
  noData: number;
  failed: number;
  deferred: number;
  notified: number;
}

function emptySummary(selected = 0): CycleSummary {
  return { selected, changed: 0, unchanged: 0, noData: 0, failed: 0, deferred: 0, notified: 0 };
}

export class Reconciler {
  private store: ShipmentStore;
  private adapter: TrackingAdapter | null;
  private notifier: Notifier;
  private logger: Logger;
  private metrics: Metrics | undefined;
  private schedule: ScheduleConfig;
  private batchCeiling: number;
  private now: () => number;

  constructor(deps: ReconcilerDeps) {
    this.store = deps.store;
    this.adapter = deps.adapter;
    this.notifier = deps.notifier;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.schedule = deps.schedule ?? DEFAULT_SCHEDULE;
    this.batchCeiling = deps.batchCeiling ?? 100;
    this.now = deps.now ?? Date.now;
  }

  get configured(): boolean {
    return this.adapter !== null;
  }

  private requireAdapter(): TrackingAdapter {
    if (!this.adapter) {
      throw new ProviderError("Tracking provider is not configured", "not_configured");
    }
    return this.adapter;
  }

  /**
   * Normalize, derive, persist; on change also record history and, when
   * asked, notify. Derives from the stored row, not from `shipment`, so an
   * archive or restore made while the payload was in flight is kept. The
   * persisted update is never rolled back by a failed history write or
   * notification.
   */
  async observe(
    shipment: Shipment,
    payload: RawPayload | undefined,
    options: { notify: boolean },
  ): Promise<Observation> {
    const now = this.now();
    const normalized = payload ? normalizePayload(payload) : undefined;
    const current = this.store.getShipment(shipment.id) ?? shipment;
    const { shipment: next, outcome } = deriveUpdate(current, normalized, now, this.schedule);

    this.store.upsertShipment(next);

    const event = normalized?.event ?? null;
    if (outcome !== "changed" || !event) {
      return { outcome, shipment: next, event, notified: null };
    }

    try {
      this.store.addShipmentEvent(next.id, event, next.last_event_fingerprint ?? "", now);
    } catch (err) {
      this.logger.error("shipment history write failed", {
        shipment_id: next.id,
        tracking_number: next.tracking_number,
        error: errorMessage(err),
      });
    }
    this.metrics?.increment("shipments_changed");
    this.logger.info("shipment changed", {
      shipment_id: next.id,
      tracking_number: next.tracking_number,
      status: event.status_norm,
      state: next.state,
    });

    if (!options.notify) {
      return { outcome, shipment: next, event, notified: null };
    }

    const notified = await fanOut({ store: this.store, notifier: this.notifier, logger: this.logger }, next, event);
    this.metrics?.increment("notifications_delivered", notified.delivered);
    this.metrics?.increment("notifications_failed", notified.failed);
    return { outcome, shipment: next, event, notified };
  }

  /**
   * One polling cycle over the due shipments. A rate limit defers the whole
   * batch; any other batch-level failure aborts the cycle without writes.
   */
  runCycle(): Promise<CycleSummary> {
    return withRequestId(newRequestId("cyc_"), () => this.cycle());
  }

  private async cycle(): Promise<CycleSummary> {
    const adapter = this.requireAdapter();
    const now = this.now();
    const due = this.store.findDueShipments(this.batchCeiling, now);
    const summary = emptySummary(due.length);
    this.metrics?.increment("poll_cycles");
    if (due.length === 0) return summary;

    let payloads: Map<string, RawPayload>;
    try {
      payloads = await adapter.fetchBatch(
        due.map((s) => ({ tracking_number: s.tracking_number, carrier_code: s.carrier_code })),
      );
    } catch (err) {
      if (err instanceof ProviderError && err.code === "rate_limited") {
        const deferredUntil = now + this.schedule.rateLimitBackoffMs;
        for (const shipment of due) {
          const current = this.store.getShipment(shipment.id);
          if (current?.state !== "active") continue;
          this.store.upsertShipment({ ...current, next_check_at: deferredUntil, updated_at: now });
          summary.deferred++;
        }
        this.metrics?.increment("batches_deferred");
        this.logger.warn("provider rate limited, batch deferred", {
          shipments: summary.deferred,
          next_check_at: deferredUntil,
        });
        return summary;
      }

      summary.failed = due.length;
      this.metrics?.increment("cycles_aborted");
      this.logger.error("batch fetch failed, cycle aborted", {
        shipments: due.length,
        error: errorMessage(err),
      });
      return summary;
    }

    for (const shipment of due) {
      try {
        const result = await this.observe(shipment, payloads.get(shipment.tracking_number.toUpperCase()), {
          notify: true,
        });
        if (result.outcome === "changed") summary.changed++;
        else if (result.outcome === "unchanged") summary.unchanged++;
        else summary.noData++;
        summary.notified += result.notified?.delivered ?? 0;
      } catch (err) {
        summary.failed++;
        this.logger.error("shipment update failed", {
          shipment_id: shipment.id,
          tracking_number: shipment.tracking_number,
          error: errorMessage(err),
        });
      }
    }

    this.logger.info("poll cycle finished", { ...summary });
    return summary;
  }

  /**
   * Manual refresh: the same pipeline as one shipment of a cycle, plus the
   * payload's full event history.
   */
  async refresh(shipmentId: string): Promise<{ observation: Observation; history: CanonicalEvent[] }> {
    const adapter = this.requireAdapter();
    const shipment = this.store.getShipment(shipmentId);
    if (!shipment) {
      throw new ProviderError(`Shipment ${shipmentId} not found`, "not_found");
    }

    const payload = await adapter.fetchOne(shipment.tracking_number, shipment.carrier_code);
    const observation = await this.observe(shipment, payload, { notify: true });
    return { observation, history: payload ? adapter.history(payload) : [] };
  }
}
