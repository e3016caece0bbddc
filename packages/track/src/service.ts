// SPDX-License-Identifier: Apache-2.0
import { type Logger, RateLimiter, type ServiceResult, errorMessage, failure } from "@parcelwatch/common";
import type { TrackingAdapter } from "./adapter.ts";
import type {
  DetectCarriersResponse,
  RefreshShipmentResponse,
  RegisterShipmentRequest,
  RegisterShipmentResponse,
  Shipment,
  ShipmentEventsResponse,
  ShipmentListResponse,
  ShipmentState,
  Subscription,
} from "./api.ts";
import { cleanTrackingNumber } from "./carriers.ts";
import type { LimitsConfig } from "./config.ts";
import { ProviderError } from "./provider.ts";
import type { Reconciler } from "./reconcile.ts";
import type { ShipmentStore } from "./store.ts";

// Re-export for convenience
export { ProviderError } from "./provider.ts";

const MAX_ITEM_NAME = 100;

// ─── Context ──────────────────────────────────────────────────────────────────

export interface ServiceContext {
  store: ShipmentStore;
  reconciler: Reconciler;
  /** Null when no provider is configured. */
  adapter: TrackingAdapter | null;
  logger: Logger;
  /** Registrations per user. */
  addLimiter: RateLimiter;
  /** Manual refreshes per user and shipment. */
  refreshLimiter: RateLimiter;
  maxActivePerUser: number;
  now: () => number;
}

export function createServiceContext(deps: {
  store: ShipmentStore;
  reconciler: Reconciler;
  adapter: TrackingAdapter | null;
  logger: Logger;
  limits: LimitsConfig;
  now?: () => number;
}): ServiceContext {
  const now = deps.now ?? Date.now;
  return {
    store: deps.store,
    reconciler: deps.reconciler,
    adapter: deps.adapter,
    logger: deps.logger,
    addLimiter: new RateLimiter({ max: deps.limits.addPerMinute, windowMs: 60_000, now }),
    refreshLimiter: new RateLimiter({ max: 1, windowMs: deps.limits.refreshCooldownMs, now }),
    maxActivePerUser: deps.limits.maxActivePerUser,
    now,
  };
}

// ─── Error mapping ────────────────────────────────────────────────────────────

function handleProviderError(err: unknown): ServiceResult<never> {
  if (err instanceof ProviderError) {
    switch (err.code) {
      case "not_found":
        return failure(404, "not_found", err.message);
      case "invalid_request":
        return failure(400, "invalid_request", err.message);
      case "rate_limited":
        return failure(429, "rate_limited", err.message, err.retryAfter);
      case "not_configured":
        return failure(503, "not_configured", err.message);
      case "malformed_payload":
        return failure(502, "malformed_payload", err.message);
      default:
        return failure(502, "provider_unavailable", err.message);
    }
  }
  throw err;
}

function notConfigured(): ServiceResult<never> {
  return failure(503, "not_configured", "Tracking provider is not configured");
}

function retryAfterSeconds(resetMs: number): number {
  return Math.max(1, Math.ceil(resetMs / 1000));
}

// ─── detectCarriers ───────────────────────────────────────────────────────────

export async function detectCarriers(
  ctx: ServiceContext,
  trackingNumber: string,
): Promise<ServiceResult<DetectCarriersResponse>> {
  const number = cleanTrackingNumber(trackingNumber);
  if (!number) return failure(400, "invalid_request", "tracking_number must be 5-30 letters or digits");
  if (!ctx.adapter) return notConfigured();

  const candidates = await ctx.adapter.detectCarriers(number);
  return { ok: true, data: { tracking_number: number, candidates } };
}

// ─── registerShipment ─────────────────────────────────────────────────────────

export async function registerShipment(
  ctx: ServiceContext,
  request: RegisterShipmentRequest,
): Promise<ServiceResult<RegisterShipmentResponse>> {
  const userId = typeof request.user_id === "string" ? request.user_id.trim() : "";
  if (!userId) return failure(400, "invalid_request", "user_id is required");

  const number = cleanTrackingNumber(typeof request.tracking_number === "string" ? request.tracking_number : "");
  if (!number) return failure(400, "invalid_request", "tracking_number must be 5-30 letters or digits");

  const itemName = (typeof request.item_name === "string" ? request.item_name.trim() : "") || number;
  if (itemName.length > MAX_ITEM_NAME) {
    return failure(400, "invalid_request", `item_name must be at most ${MAX_ITEM_NAME} characters`);
  }

  const adapter = ctx.adapter;
  if (!adapter) return notConfigured();

  const limit = ctx.addLimiter.check(userId);
  if (!limit.allowed) {
    return failure(429, "rate_limited", "Too many shipments added, slow down", retryAfterSeconds(limit.resetMs));
  }

  try {
    const explicit = typeof request.carrier_code === "string" ? request.carrier_code.trim() : "";
    const candidates = explicit ? [] : await adapter.detectCarriers(number);
    const carrierCode = explicit || candidates[0].code;

    const existing = ctx.store.findShipmentByKey(number, carrierCode);
    const existingSub = existing ? ctx.store.getSubscription(userId, existing.id) : undefined;
    if (existing && existingSub) {
      return { ok: true, data: { shipment: existing, subscription: existingSub, created: false } };
    }

    if (ctx.store.countActiveSubscriptions(userId) >= ctx.maxActivePerUser) {
      return failure(
        403,
        "limit_exceeded",
        `At most ${ctx.maxActivePerUser} active shipments per user`,
      );
    }

    if (!existing) {
      const registered = await adapter.register(number, carrierCode);
      if (!registered) {
        return failure(502, "provider_unavailable", `Provider refused to track ${number}`);
      }
    }

    const now = ctx.now();
    const { shipment, created } = ctx.store.createShipment({
      tracking_number: number,
      carrier_code: carrierCode,
      carrier_candidates: candidates,
      now,
    });
    const { subscription } = ctx.store.createSubscription({
      user_id: userId,
      shipment_id: shipment.id,
      item_name: itemName,
      now,
    });

    let current: Shipment = shipment;
    if (created) {
      current = await firstObservation(ctx, adapter, shipment);
    }

    ctx.logger.info("shipment registered", {
      shipment_id: current.id,
      tracking_number: number,
      carrier_code: carrierCode,
      created,
    });
    return { ok: true, data: { shipment: current, subscription, created } };
  } catch (err) {
    return handleProviderError(err);
  }
}

// A fetch failure here is not a registration failure: the shipment is
// already due, so the next cycle picks it up.
async function firstObservation(
  ctx: ServiceContext,
  adapter: TrackingAdapter,
  shipment: Shipment,
): Promise<Shipment> {
  try {
    const payload = await adapter.fetchOne(shipment.tracking_number, shipment.carrier_code);
    const observation = await ctx.reconciler.observe(shipment, payload, { notify: false });
    return observation.shipment;
  } catch (err) {
    ctx.logger.warn("first fetch failed, left for the next cycle", {
      shipment_id: shipment.id,
      error: errorMessage(err),
    });
    return shipment;
  }
}

// ─── refreshShipment ──────────────────────────────────────────────────────────

export async function refreshShipment(
  ctx: ServiceContext,
  shipmentId: string,
  options: { userId?: string } = {},
): Promise<ServiceResult<RefreshShipmentResponse>> {
  if (!ctx.adapter) return notConfigured();
  if (!ctx.store.getShipment(shipmentId)) return failure(404, "not_found", "Shipment not found");

  if (options.userId) {
    const limit = ctx.refreshLimiter.check(`${options.userId}:${shipmentId}`);
    if (!limit.allowed) {
      return failure(
        429,
        "rate_limited",
        "Refreshed recently, try again later",
        retryAfterSeconds(limit.resetMs),
      );
    }
  }

  try {
    const { observation, history } = await ctx.reconciler.refresh(shipmentId);
    return {
      ok: true,
      data: {
        changed: observation.outcome === "changed",
        event: observation.event ?? observation.shipment.last_event,
        shipment: observation.shipment,
        history,
      },
    };
  } catch (err) {
    return handleProviderError(err);
  }
}

// ─── Subscription operations ──────────────────────────────────────────────────

function findSubscription(ctx: ServiceContext, userId: string, shipmentId: string): Subscription | undefined {
  return ctx.store.getSubscription(userId, shipmentId);
}

const SUBSCRIPTION_NOT_FOUND = "Subscription not found";

export async function toggleMute(
  ctx: ServiceContext,
  userId: string,
  shipmentId: string,
): Promise<ServiceResult<Subscription>> {
  const sub = findSubscription(ctx, userId, shipmentId);
  if (!sub) return failure(404, "not_found", SUBSCRIPTION_NOT_FOUND);

  ctx.store.setMuted(userId, shipmentId, !sub.muted);
  return { ok: true, data: { ...sub, muted: !sub.muted } };
}

export async function renameSubscription(
  ctx: ServiceContext,
  userId: string,
  shipmentId: string,
  itemName: string,
): Promise<ServiceResult<Subscription>> {
  const name = typeof itemName === "string" ? itemName.trim() : "";
  if (!name || name.length > MAX_ITEM_NAME) {
    return failure(400, "invalid_request", `item_name must be 1-${MAX_ITEM_NAME} characters`);
  }

  const sub = findSubscription(ctx, userId, shipmentId);
  if (!sub) return failure(404, "not_found", SUBSCRIPTION_NOT_FOUND);

  ctx.store.renameSubscription(userId, shipmentId, name);
  return { ok: true, data: { ...sub, item_name: name } };
}

/** Archives the shipment for every subscriber. delivered_at stays unset. */
export async function archiveForUser(
  ctx: ServiceContext,
  userId: string,
  shipmentId: string,
): Promise<ServiceResult<Shipment>> {
  if (!findSubscription(ctx, userId, shipmentId)) return failure(404, "not_found", SUBSCRIPTION_NOT_FOUND);

  const shipment = ctx.store.archiveShipment(shipmentId, ctx.now());
  if (!shipment) return failure(404, "not_found", "Shipment not found");
  ctx.logger.info("shipment archived", { shipment_id: shipmentId, user_id: userId });
  return { ok: true, data: shipment };
}

/** Back to active and due immediately. */
export async function restore(
  ctx: ServiceContext,
  userId: string,
  shipmentId: string,
): Promise<ServiceResult<Shipment>> {
  if (!findSubscription(ctx, userId, shipmentId)) return failure(404, "not_found", SUBSCRIPTION_NOT_FOUND);

  const shipment = ctx.store.reactivateShipment(shipmentId, ctx.now());
  if (!shipment) return failure(404, "not_found", "Shipment not found");
  ctx.logger.info("shipment restored", { shipment_id: shipmentId, user_id: userId });
  return { ok: true, data: shipment };
}

/** Drops the user's subscription. The shipment itself is kept. */
export async function remove(
  ctx: ServiceContext,
  userId: string,
  shipmentId: string,
): Promise<ServiceResult<{ removed: true }>> {
  if (!ctx.store.deleteSubscription(userId, shipmentId)) {
    return failure(404, "not_found", SUBSCRIPTION_NOT_FOUND);
  }
  return { ok: true, data: { removed: true } };
}

export async function listShipments(
  ctx: ServiceContext,
  userId: string,
  state?: ShipmentState,
): Promise<ServiceResult<ShipmentListResponse>> {
  return { ok: true, data: { shipments: ctx.store.listUserSubscriptions(userId, state) } };
}

export async function shipmentHistory(
  ctx: ServiceContext,
  shipmentId: string,
  limit = 20,
): Promise<ServiceResult<ShipmentEventsResponse>> {
  if (!ctx.store.getShipment(shipmentId)) return failure(404, "not_found", "Shipment not found");
  const bounded = Math.min(Math.max(Math.trunc(limit) || 20, 1), 100);
  return {
    ok: true,
    data: { shipment_id: shipmentId, events: ctx.store.listShipmentEvents(shipmentId, bounded) },
  };
}
