// SPDX-License-Identifier: Apache-2.0
import type { StatusNorm } from "../api.ts";

// Checked in order. Negative delivery phrases precede "delivered" so that
// "not delivered" never reads as a delivery.
const KEYWORD_RULES: ReadonlyArray<readonly [StatusNorm, readonly string[]]> = [
  ["EXCEPTION", ["undelivered", "not delivered", "delivery failed", "failed", "לא נמסר"]],
  ["DELIVERED", ["delivered", "נמסר"]],
  ["OUT_FOR_DELIVERY", ["out for delivery", "יצא לחלוקה"]],
  ["CUSTOMS", ["customs", "מכס"]],
];

const ARRIVAL_WORDS = ["arrived", "הגיע"];
const DESTINATION_WORDS = ["destination", "יעד"];

const LATE_RULES: ReadonlyArray<readonly [StatusNorm, readonly string[]]> = [
  ["IN_TRANSIT", ["in transit", "בדרך"]],
  ["EXCEPTION", ["exception", "problem", "חריגה", "בעיה"]],
  ["EXPIRED", ["expired", "פג"]],
];

function containsAny(text: string, words: readonly string[]): boolean {
  return words.some((w) => text.includes(w));
}

/** Keyword match over status text. Undefined when nothing matches. */
export function statusFromKeywords(statusRaw: string): StatusNorm | undefined {
  const text = statusRaw.toLowerCase();

  for (const [status, words] of KEYWORD_RULES) {
    if (containsAny(text, words)) return status;
  }

  if (containsAny(text, ARRIVAL_WORDS)) {
    return containsAny(text, DESTINATION_WORDS) ? "ARRIVED_DESTINATION" : "ARRIVED_SORTING_CENTER";
  }

  for (const [status, words] of LATE_RULES) {
    if (containsAny(text, words)) return status;
  }

  return undefined;
}

/**
 * Provider code first, then keywords, then IN_TRANSIT. An event exists, so
 * the result is never UNKNOWN.
 */
export function normalizeStatus(statusRaw: string, fromCode: StatusNorm | undefined): StatusNorm {
  if (fromCode && fromCode !== "UNKNOWN") return fromCode;
  return statusFromKeywords(statusRaw) ?? "IN_TRANSIT";
}
