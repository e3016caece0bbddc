// SPDX-License-Identifier: Apache-2.0
import { createHmac } from "node:crypto";
import { type Logger, errorMessage } from "@parcelwatch/common";
import type { CanonicalEvent, Shipment, StatusNorm } from "./api.ts";
import { parseTimestamp } from "./normalize/index.ts";
import type { ShipmentStore } from "./store.ts";

// ─── Transport contract ───────────────────────────────────────────────────────

export interface Notifier {
  /** Send `text` to a subscriber. False or a throw counts as a failed delivery. */
  deliver(userId: string, text: string): Promise<boolean>;
}

// ─── Rendering ────────────────────────────────────────────────────────────────

const STATUS_EMOJI: Record<StatusNorm, string> = {
  INFO_RECEIVED: "ℹ️",
  IN_TRANSIT: "✈️",
  ARRIVED_SORTING_CENTER: "📬",
  ARRIVED_DESTINATION: "🏠",
  CUSTOMS: "🛃",
  OUT_FOR_DELIVERY: "🚚",
  DELIVERED: "✅",
  EXCEPTION: "⚠️",
  EXPIRED: "⏰",
  UNKNOWN: "❓",
};

export const STATUS_LABELS: Record<StatusNorm, string> = {
  INFO_RECEIVED: "Shipping info received",
  IN_TRANSIT: "In transit",
  ARRIVED_SORTING_CENTER: "At a sorting center",
  ARRIVED_DESTINATION: "Arrived in destination country",
  CUSTOMS: "In customs",
  OUT_FOR_DELIVERY: "Out for delivery",
  DELIVERED: "Delivered",
  EXCEPTION: "Delivery exception",
  EXPIRED: "Tracking expired",
  UNKNOWN: "Unknown",
};

// yyyy-MM-dd HH:mm UTC
function formatUtc(iso: string): string | null {
  const utc = parseTimestamp(iso)?.toISOString();
  if (!utc) return null;
  return `${utc.slice(0, 10)} ${utc.slice(11, 16)} UTC`;
}

export function renderNotification(itemName: string, event: CanonicalEvent, shipment: Shipment): string {
  const lines = [
    `${STATUS_EMOJI[event.status_norm]} Update for ${itemName}`,
    "",
    `📦 Tracking number: ${shipment.tracking_number}`,
    `Status: ${STATUS_LABELS[event.status_norm]}`,
  ];

  if (event.status_raw) lines.push(`📝 ${event.status_raw}`);
  if (event.location) lines.push(`📍 ${event.location}`);

  const when = event.timestamp ? formatUtc(event.timestamp) : null;
  if (when) lines.push(`🕐 ${when}`);

  if (event.status_norm === "DELIVERED") {
    lines.push("", "🎉 Your package was delivered. Tracking has been archived.");
  }

  return lines.join("\n");
}

// ─── Fan-out ──────────────────────────────────────────────────────────────────

export interface FanOutDeps {
  store: ShipmentStore;
  notifier: Notifier;
  logger: Logger;
}

export interface FanOutResult {
  delivered: number;
  failed: number;
}

/**
 * Deliver one change to every non-muted subscriber, one at a time. A failed
 * delivery is logged and counted; it never stops the rest.
 */
export async function fanOut(deps: FanOutDeps, shipment: Shipment, event: CanonicalEvent): Promise<FanOutResult> {
  const result: FanOutResult = { delivered: 0, failed: 0 };

  for (const sub of deps.store.listSubscribers(shipment.id, false)) {
    const text = renderNotification(sub.item_name, event, shipment);
    try {
      if (await deps.notifier.deliver(sub.user_id, text)) {
        result.delivered++;
        continue;
      }
      deps.logger.warn("notification rejected", { shipment_id: shipment.id, user_id: sub.user_id });
    } catch (err) {
      deps.logger.error("notification failed", {
        shipment_id: shipment.id,
        user_id: sub.user_id,
        error: errorMessage(err),
      });
    }
    result.failed++;
  }

  return result;
}

// ─── Transports ───────────────────────────────────────────────────────────────

export function signPayload(secret: string, body: string): string {
  return createHmac("sha256", secret).update(body).digest("hex");
}

export interface WebhookNotifierOptions {
  url: string;
  /** HMAC-SHA256 key for the X-Signature header. Unsigned when omitted. */
  secret?: string;
  /** Default: 10 000 ms */
  timeoutMs?: number;
}

/** POSTs `{ user_id, text }` to the front-end's inbound endpoint. */
export class WebhookNotifier implements Notifier {
  private options: WebhookNotifierOptions;

  constructor(options: WebhookNotifierOptions) {
    this.options = options;
  }

  async deliver(userId: string, text: string): Promise<boolean> {
    const body = JSON.stringify({ user_id: userId, text });
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.secret) {
      headers["X-Signature"] = signPayload(this.options.secret, body);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 10_000);
    try {
      const res = await fetch(this.options.url, {
        method: "POST",
        headers,
        body,
        signal: controller.signal,
      });
      return res.ok;
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Writes each notification to the log. For running without a front-end. */
export class LogNotifier implements Notifier {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async deliver(userId: string, text: string): Promise<boolean> {
    this.logger.info("notification", { user_id: userId, text });
    return true;
  }
}
