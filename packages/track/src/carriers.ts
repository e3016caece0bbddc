// SPDX-License-Identifier: Apache-2.0
import type { CarrierCandidate } from "./api.ts";
import type { ProviderName } from "./provider.ts";

// ─── Carrier signatures ───────────────────────────────────────────────────────

interface CarrierCode {
  name: string;
  codes: Record<ProviderName, string>;
}

interface CarrierPattern {
  matches(trackingNumber: string): boolean;
  carriers: CarrierCode[];
}

const DIGITS = /^\d+$/;

// First matching signature wins. 17TRACK codes are numeric carrier ids,
// TrackingMore codes are courier slugs.
const PATTERNS: CarrierPattern[] = [
  {
    matches: (n) => n.endsWith("CN") && n.length === 13,
    carriers: [
      { name: "China Post", codes: { "17track": "2005", trackingmore: "china-post" } },
      { name: "Cainiao", codes: { "17track": "2014", trackingmore: "cainiao" } },
    ],
  },
  {
    matches: (n) => n.startsWith("IL") || n.endsWith("IL"),
    carriers: [{ name: "Israel Post", codes: { "17track": "5", trackingmore: "israel-post" } }],
  },
  {
    matches: (n) => n.startsWith("9") && (n.length === 20 || n.length === 22),
    carriers: [{ name: "USPS", codes: { "17track": "21051", trackingmore: "usps" } }],
  },
  {
    matches: (n) => n.length === 10 && DIGITS.test(n),
    carriers: [{ name: "DHL", codes: { "17track": "6", trackingmore: "dhl" } }],
  },
  {
    matches: (n) => n.length === 12 && DIGITS.test(n),
    carriers: [{ name: "FedEx", codes: { "17track": "2018", trackingmore: "fedex" } }],
  },
  {
    matches: (n) => n.startsWith("1Z"),
    carriers: [{ name: "UPS", codes: { "17track": "21037", trackingmore: "ups" } }],
  },
];

/** Static signature lookup. Empty when no signature matches. */
export function detectByPattern(trackingNumber: string, provider: ProviderName): CarrierCandidate[] {
  const n = trackingNumber.trim().toUpperCase();
  const pattern = PATTERNS.find((p) => p.matches(n));
  if (!pattern) return [];
  return pattern.carriers.map((c) => ({ code: c.codes[provider], name: c.name }));
}

// ─── Tracking number validation ───────────────────────────────────────────────

const TRACKING_NUMBER = /^[A-Z0-9]{5,30}$/;

/** Upper-cased, trimmed form of `raw`, or null when it is not a plausible tracking number. */
export function cleanTrackingNumber(raw: string): string | null {
  const n = raw.trim().toUpperCase();
  return TRACKING_NUMBER.test(n) ? n : null;
}
