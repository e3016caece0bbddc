// SPDX-License-Identifier: Apache-2.0
// ─── Canonical status ─────────────────────────────────────────────────────────

export const STATUS_NORMS = [
  "INFO_RECEIVED",
  "IN_TRANSIT",
  "ARRIVED_SORTING_CENTER",
  "ARRIVED_DESTINATION",
  "CUSTOMS",
  "OUT_FOR_DELIVERY",
  "DELIVERED",
  "EXCEPTION",
  "EXPIRED",
  "UNKNOWN",
] as const;

export type StatusNorm = (typeof STATUS_NORMS)[number];

export function isStatusNorm(value: unknown): value is StatusNorm {
  return typeof value === "string" && (STATUS_NORMS as readonly string[]).includes(value);
}

// ─── Events ───────────────────────────────────────────────────────────────────

export interface CanonicalEvent {
  /** Provider's original status text. */
  status_raw: string;
  /** Normalized status. */
  status_norm: StatusNorm;
  /** ISO 8601 UTC instant, or null when the provider's timestamp did not parse. */
  timestamp: string | null;
  /** Free-text location, when the provider gave one. */
  location: string | null;
  /** Provider entry the event was read from. Diagnostics only. */
  raw: unknown;
}

export interface NormalizedEvent {
  event: CanonicalEvent | null;
  /** Empty string when `event` is null. */
  fingerprint: string;
}

export interface ShipmentEventRecord {
  id: number;
  shipment_id: string;
  event: CanonicalEvent;
  fingerprint: string;
  recorded_at: number;
}

// ─── Carriers ─────────────────────────────────────────────────────────────────

export interface CarrierCandidate {
  /** Provider carrier code, or "auto" to let the provider decide. */
  code: string;
  name: string;
}

export const AUTO_CARRIER: CarrierCandidate = { code: "auto", name: "Auto Detect" };

export interface TrackingKey {
  tracking_number: string;
  carrier_code: string;
}

// ─── Shipments and subscriptions ──────────────────────────────────────────────

export type ShipmentState = "active" | "archived";

export interface Shipment {
  id: string;
  tracking_number: string;
  carrier_code: string;
  carrier_candidates: CarrierCandidate[];
  state: ShipmentState;
  last_event: CanonicalEvent | null;
  last_event_fingerprint: string | null;
  /** Unix ms */
  last_check_at: number | null;
  /** Unix ms. Null only while archived or before the first poll. */
  next_check_at: number | null;
  /** Unix ms. Stamped once, on the delivery transition. */
  delivered_at: number | null;
  created_at: number;
  updated_at: number;
}

export interface Subscription {
  id: string;
  user_id: string;
  shipment_id: string;
  item_name: string;
  muted: boolean;
  created_at: number;
}

export interface UserShipment {
  subscription: Subscription;
  shipment: Shipment;
}

// ─── HTTP requests and responses ──────────────────────────────────────────────

export interface DetectCarriersResponse {
  tracking_number: string;
  candidates: CarrierCandidate[];
}

export interface RegisterShipmentRequest {
  /** Chat identity of the subscriber. */
  user_id: string;
  tracking_number: string;
  /** Provider carrier code. Omit to use the first detected candidate. */
  carrier_code?: string;
  /** Free-text label shown in notifications. Defaults to the tracking number. */
  item_name?: string;
}

export interface RegisterShipmentResponse {
  shipment: Shipment;
  subscription: Subscription;
  /** False when the shipment already existed and the user was only subscribed. */
  created: boolean;
}

export interface RefreshShipmentResponse {
  changed: boolean;
  event: CanonicalEvent | null;
  shipment: Shipment;
  /** Every event in the payload, newest first. */
  history: CanonicalEvent[];
}

export interface RenameSubscriptionRequest {
  item_name: string;
}

export interface ShipmentListResponse {
  shipments: UserShipment[];
}

export interface ShipmentEventsResponse {
  shipment_id: string;
  events: ShipmentEventRecord[];
}
