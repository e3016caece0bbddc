// SPDX-License-Identifier: Apache-2.0
import { randomBytes } from "node:crypto";
import Database from "better-sqlite3";
import type {
  CanonicalEvent,
  CarrierCandidate,
  Shipment,
  ShipmentEventRecord,
  ShipmentState,
  Subscription,
  UserShipment,
} from "./api.ts";
import { isStatusNorm } from "./api.ts";
import { isRecord } from "./normalize/fields.ts";
import type { NewShipment, NewSubscription, ShipmentStore } from "./store.ts";

// ─── Rows ─────────────────────────────────────────────────────────────────────

interface ShipmentRow {
  id: string;
  tracking_number: string;
  carrier_code: string;
  carrier_candidates: string;
  state: string;
  last_event: string | null;
  last_event_fingerprint: string | null;
  last_check_at: number | null;
  next_check_at: number | null;
  delivered_at: number | null;
  created_at: number;
  updated_at: number;
}

interface SubscriptionRow {
  id: string;
  user_id: string;
  shipment_id: string;
  item_name: string;
  muted: number;
  created_at: number;
}

interface EventRow {
  id: number;
  shipment_id: string;
  status_raw: string;
  status_norm: string;
  timestamp: string | null;
  location: string | null;
  raw: string | null;
  fingerprint: string;
  recorded_at: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS shipments (
    id                     TEXT PRIMARY KEY,
    tracking_number        TEXT NOT NULL,
    carrier_code           TEXT NOT NULL,
    carrier_candidates     TEXT NOT NULL DEFAULT '[]',
    state                  TEXT NOT NULL DEFAULT 'active',
    last_event             TEXT,
    last_event_fingerprint TEXT,
    last_check_at          INTEGER,
    next_check_at          INTEGER,
    delivered_at           INTEGER,
    created_at             INTEGER NOT NULL,
    updated_at             INTEGER NOT NULL,
    UNIQUE (tracking_number, carrier_code)
  );

  CREATE TABLE IF NOT EXISTS subscriptions (
    id          TEXT PRIMARY KEY,
    user_id     TEXT NOT NULL,
    shipment_id TEXT NOT NULL,
    item_name   TEXT NOT NULL,
    muted       INTEGER NOT NULL DEFAULT 0,
    created_at  INTEGER NOT NULL,
    UNIQUE (user_id, shipment_id),
    FOREIGN KEY (shipment_id) REFERENCES shipments(id)
  );

  CREATE TABLE IF NOT EXISTS shipment_events (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    shipment_id TEXT NOT NULL,
    status_raw  TEXT NOT NULL,
    status_norm TEXT NOT NULL,
    timestamp   TEXT,
    location    TEXT,
    raw         TEXT,
    fingerprint TEXT NOT NULL,
    recorded_at INTEGER NOT NULL,
    FOREIGN KEY (shipment_id) REFERENCES shipments(id)
  );

  CREATE INDEX IF NOT EXISTS idx_shipments_due ON shipments(state, next_check_at);
  CREATE INDEX IF NOT EXISTS idx_subscriptions_shipment ON subscriptions(shipment_id);
  CREATE INDEX IF NOT EXISTS idx_subscriptions_user ON subscriptions(user_id);
  CREATE INDEX IF NOT EXISTS idx_events_shipment ON shipment_events(shipment_id, id);
`;

// ─── Row mapping ──────────────────────────────────────────────────────────────

function parseJson(text: string | null): unknown {
  if (text === null) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function toEvent(value: unknown): CanonicalEvent | null {
  if (!isRecord(value)) return null;
  const { status_raw, status_norm, timestamp, location, raw } = value;
  if (typeof status_raw !== "string" || !isStatusNorm(status_norm)) return null;
  return {
    status_raw,
    status_norm,
    timestamp: typeof timestamp === "string" ? timestamp : null,
    location: typeof location === "string" ? location : null,
    raw: raw ?? null,
  };
}

function toCandidates(value: unknown): CarrierCandidate[] {
  if (!Array.isArray(value)) return [];
  const candidates: CarrierCandidate[] = [];
  for (const item of value) {
    if (isRecord(item) && typeof item.code === "string" && typeof item.name === "string") {
      candidates.push({ code: item.code, name: item.name });
    }
  }
  return candidates;
}

function toShipment(row: ShipmentRow): Shipment {
  return {
    id: row.id,
    tracking_number: row.tracking_number,
    carrier_code: row.carrier_code,
    carrier_candidates: toCandidates(parseJson(row.carrier_candidates)),
    state: row.state === "archived" ? "archived" : "active",
    last_event: toEvent(parseJson(row.last_event)),
    last_event_fingerprint: row.last_event_fingerprint,
    last_check_at: row.last_check_at,
    next_check_at: row.next_check_at,
    delivered_at: row.delivered_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

function toRow(shipment: Shipment): ShipmentRow {
  return {
    ...shipment,
    carrier_candidates: JSON.stringify(shipment.carrier_candidates),
    last_event: shipment.last_event ? JSON.stringify(shipment.last_event) : null,
  };
}

function toSubscription(row: SubscriptionRow): Subscription {
  return { ...row, muted: row.muted === 1 };
}

function newId(prefix: string): string {
  return `${prefix}_${randomBytes(8).toString("hex")}`;
}

// ─── SqliteShipmentStore ──────────────────────────────────────────────────────

export class SqliteShipmentStore implements ShipmentStore {
  private db: Database.Database;

  /** `path` is a file path or ":memory:". */
  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
  }

  // ─── Shipments ──────────────────────────────────────────────────────────

  findDueShipments(limit: number, now: number): Shipment[] {
    return this.db
      .prepare<[number, number], ShipmentRow>(
        `SELECT * FROM shipments
         WHERE state = 'active' AND next_check_at IS NOT NULL AND next_check_at <= ?
         ORDER BY next_check_at ASC
         LIMIT ?`,
      )
      .all(now, limit)
      .map(toShipment);
  }

  getShipment(id: string): Shipment | undefined {
    const row = this.db
      .prepare<[string], ShipmentRow>("SELECT * FROM shipments WHERE id = ?")
      .get(id);
    return row ? toShipment(row) : undefined;
  }

  findShipmentByKey(trackingNumber: string, carrierCode: string): Shipment | undefined {
    const row = this.db
      .prepare<[string, string], ShipmentRow>(
        "SELECT * FROM shipments WHERE tracking_number = ? AND carrier_code = ?",
      )
      .get(trackingNumber, carrierCode);
    return row ? toShipment(row) : undefined;
  }

  createShipment(input: NewShipment): { shipment: Shipment; created: boolean } {
    const result = this.db
      .prepare<[string, string, string, string, number, number, number]>(
        `INSERT INTO shipments (id, tracking_number, carrier_code, carrier_candidates, next_check_at, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (tracking_number, carrier_code) DO NOTHING`,
      )
      .run(
        newId("shp"),
        input.tracking_number,
        input.carrier_code,
        JSON.stringify(input.carrier_candidates),
        input.now,
        input.now,
        input.now,
      );

    const shipment = this.findShipmentByKey(input.tracking_number, input.carrier_code);
    if (!shipment) {
      throw new Error(`[db] shipment ${input.tracking_number} missing after insert`);
    }
    return { shipment, created: result.changes > 0 };
  }

  upsertShipment(shipment: Shipment): void {
    this.db
      .prepare<ShipmentRow>(
        `INSERT INTO shipments (id, tracking_number, carrier_code, carrier_candidates, state, last_event, last_event_fingerprint, last_check_at, next_check_at, delivered_at, created_at, updated_at)
         VALUES (@id, @tracking_number, @carrier_code, @carrier_candidates, @state, @last_event, @last_event_fingerprint, @last_check_at, @next_check_at, @delivered_at, @created_at, @updated_at)
         ON CONFLICT (id) DO UPDATE SET
           carrier_candidates = excluded.carrier_candidates,
           state = excluded.state,
           last_event = excluded.last_event,
           last_event_fingerprint = excluded.last_event_fingerprint,
           last_check_at = excluded.last_check_at,
           next_check_at = excluded.next_check_at,
           delivered_at = excluded.delivered_at,
           updated_at = excluded.updated_at`,
      )
      .run(toRow(shipment));
  }

  archiveShipment(id: string, now: number, deliveredAt?: number): Shipment | undefined {
    this.db
      .prepare<[number | null, number, string]>(
        `UPDATE shipments
         SET state = 'archived', next_check_at = NULL, delivered_at = COALESCE(delivered_at, ?), updated_at = ?
         WHERE id = ?`,
      )
      .run(deliveredAt ?? null, now, id);
    return this.getShipment(id);
  }

  reactivateShipment(id: string, nextCheckAt: number): Shipment | undefined {
    this.db
      .prepare<[number, number, string]>(
        `UPDATE shipments
         SET state = 'active', next_check_at = ?, delivered_at = NULL, updated_at = ?
         WHERE id = ?`,
      )
      .run(nextCheckAt, nextCheckAt, id);
    return this.getShipment(id);
  }

  // ─── Event history ──────────────────────────────────────────────────────

  addShipmentEvent(shipmentId: string, event: CanonicalEvent, fingerprint: string, recordedAt: number): void {
    this.db
      .prepare<[string, string, string, string | null, string | null, string, string, number]>(
        `INSERT INTO shipment_events (shipment_id, status_raw, status_norm, timestamp, location, raw, fingerprint, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        shipmentId,
        event.status_raw,
        event.status_norm,
        event.timestamp,
        event.location,
        JSON.stringify(event.raw ?? null),
        fingerprint,
        recordedAt,
      );
  }

  listShipmentEvents(shipmentId: string, limit: number): ShipmentEventRecord[] {
    const rows = this.db
      .prepare<[string, number], EventRow>(
        "SELECT * FROM shipment_events WHERE shipment_id = ? ORDER BY id DESC LIMIT ?",
      )
      .all(shipmentId, limit);

    const records: ShipmentEventRecord[] = [];
    for (const row of rows) {
      const event = toEvent({ ...row, raw: parseJson(row.raw) });
      if (!event) continue;
      records.push({
        id: row.id,
        shipment_id: row.shipment_id,
        event,
        fingerprint: row.fingerprint,
        recorded_at: row.recorded_at,
      });
    }
    return records;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────────

  createSubscription(input: NewSubscription): { subscription: Subscription; created: boolean } {
    const result = this.db
      .prepare<[string, string, string, string, number]>(
        `INSERT INTO subscriptions (id, user_id, shipment_id, item_name, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (user_id, shipment_id) DO NOTHING`,
      )
      .run(newId("sub"), input.user_id, input.shipment_id, input.item_name, input.now);

    const subscription = this.getSubscription(input.user_id, input.shipment_id);
    if (!subscription) {
      throw new Error(`[db] subscription for ${input.shipment_id} missing after insert`);
    }
    return { subscription, created: result.changes > 0 };
  }

  getSubscription(userId: string, shipmentId: string): Subscription | undefined {
    const row = this.db
      .prepare<[string, string], SubscriptionRow>(
        "SELECT * FROM subscriptions WHERE user_id = ? AND shipment_id = ?",
      )
      .get(userId, shipmentId);
    return row ? toSubscription(row) : undefined;
  }

  listSubscribers(shipmentId: string, includeMuted: boolean): Subscription[] {
    const sql = includeMuted
      ? "SELECT * FROM subscriptions WHERE shipment_id = ? ORDER BY created_at ASC, rowid ASC"
      : "SELECT * FROM subscriptions WHERE shipment_id = ? AND muted = 0 ORDER BY created_at ASC, rowid ASC";
    return this.db.prepare<[string], SubscriptionRow>(sql).all(shipmentId).map(toSubscription);
  }

  listUserSubscriptions(userId: string, state?: ShipmentState): UserShipment[] {
    const rows = state
      ? this.db
          .prepare<[string, string], SubscriptionRow>(
            `SELECT s.* FROM subscriptions s JOIN shipments sh ON sh.id = s.shipment_id
             WHERE s.user_id = ? AND sh.state = ?
             ORDER BY s.created_at DESC, s.rowid DESC`,
          )
          .all(userId, state)
      : this.db
          .prepare<[string], SubscriptionRow>(
            "SELECT * FROM subscriptions WHERE user_id = ? ORDER BY created_at DESC, rowid DESC",
          )
          .all(userId);

    const result: UserShipment[] = [];
    for (const row of rows) {
      const shipment = this.getShipment(row.shipment_id);
      if (shipment) result.push({ subscription: toSubscription(row), shipment });
    }
    return result;
  }

  countActiveSubscriptions(userId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        `SELECT COUNT(*) AS count FROM subscriptions s JOIN shipments sh ON sh.id = s.shipment_id
         WHERE s.user_id = ? AND sh.state = 'active'`,
      )
      .get(userId);
    return row?.count ?? 0;
  }

  setMuted(userId: string, shipmentId: string, muted: boolean): boolean {
    const result = this.db
      .prepare<[number, string, string]>(
        "UPDATE subscriptions SET muted = ? WHERE user_id = ? AND shipment_id = ?",
      )
      .run(muted ? 1 : 0, userId, shipmentId);
    return result.changes > 0;
  }

  renameSubscription(userId: string, shipmentId: string, itemName: string): boolean {
    const result = this.db
      .prepare<[string, string, string]>(
        "UPDATE subscriptions SET item_name = ? WHERE user_id = ? AND shipment_id = ?",
      )
      .run(itemName, userId, shipmentId);
    return result.changes > 0;
  }

  deleteSubscription(userId: string, shipmentId: string): boolean {
    const result = this.db
      .prepare<[string, string]>("DELETE FROM subscriptions WHERE user_id = ? AND shipment_id = ?")
      .run(userId, shipmentId);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
