// SPDX-License-Identifier: Apache-2.0
import type {
  CanonicalEvent,
  CarrierCandidate,
  Shipment,
  ShipmentEventRecord,
  ShipmentState,
  Subscription,
  UserShipment,
} from "./api.ts";

export interface NewShipment {
  tracking_number: string;
  carrier_code: string;
  carrier_candidates: CarrierCandidate[];
  /** Unix ms; also the first next_check_at, so an unobserved shipment is due at once. */
  now: number;
}

export interface NewSubscription {
  user_id: string;
  shipment_id: string;
  item_name: string;
  now: number;
}

/**
 * Persistence contract the engine consumes. Shipment writes are full-row
 * replaces keyed by id; the last write wins.
 */
export interface ShipmentStore {
  /** Active shipments with next_check_at <= now, oldest due first. */
  findDueShipments(limit: number, now: number): Shipment[];
  getShipment(id: string): Shipment | undefined;
  findShipmentByKey(trackingNumber: string, carrierCode: string): Shipment | undefined;
  /** Idempotent on (tracking_number, carrier_code). */
  createShipment(input: NewShipment): { shipment: Shipment; created: boolean };
  upsertShipment(shipment: Shipment): void;
  /** Archive without touching delivered_at unless `deliveredAt` is given. */
  archiveShipment(id: string, now: number, deliveredAt?: number): Shipment | undefined;
  /** Back to active, due at `nextCheckAt`, delivered_at cleared. */
  reactivateShipment(id: string, nextCheckAt: number): Shipment | undefined;

  addShipmentEvent(shipmentId: string, event: CanonicalEvent, fingerprint: string, recordedAt: number): void;
  /** Newest first. */
  listShipmentEvents(shipmentId: string, limit: number): ShipmentEventRecord[];

  /** Idempotent on (user_id, shipment_id). */
  createSubscription(input: NewSubscription): { subscription: Subscription; created: boolean };
  getSubscription(userId: string, shipmentId: string): Subscription | undefined;
  listSubscribers(shipmentId: string, includeMuted: boolean): Subscription[];
  listUserSubscriptions(userId: string, state?: ShipmentState): UserShipment[];
  countActiveSubscriptions(userId: string): number;
  setMuted(userId: string, shipmentId: string, muted: boolean): boolean;
  renameSubscription(userId: string, shipmentId: string, itemName: string): boolean;
  deleteSubscription(userId: string, shipmentId: string): boolean;

  close(): void;
}
