// SPDX-License-Identifier: Apache-2.0
import type { StatusNorm } from "./api.ts";

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

export interface ScheduleConfig {
  /** No event observed yet. Default: 2 h */
  noEventMs: number;
  /** Provider returned nothing for the shipment this cycle. Default: 1 h */
  noDataMs: number;
  /** Status without its own row. Default: 4 h */
  defaultMs: number;
  /** Whole-batch deferral after a rate limit. Default: 5 min */
  rateLimitBackoffMs: number;
}

export const DEFAULT_SCHEDULE: ScheduleConfig = {
  noEventMs: 2 * HOUR,
  noDataMs: HOUR,
  defaultMs: 4 * HOUR,
  rateLimitBackoffMs: 5 * MINUTE,
};

const STATUS_INTERVALS: Partial<Record<StatusNorm, number>> = {
  OUT_FOR_DELIVERY: 15 * MINUTE,
  ARRIVED_DESTINATION: 90 * MINUTE,
  CUSTOMS: 90 * MINUTE,
  IN_TRANSIT: 5 * HOUR,
  ARRIVED_SORTING_CENTER: 5 * HOUR,
  EXCEPTION: HOUR,
  INFO_RECEIVED: 6 * HOUR,
};

/** Delay until the next check for a shipment whose latest status is `status`. */
export function checkInterval(status: StatusNorm | null, schedule: ScheduleConfig = DEFAULT_SCHEDULE): number {
  if (status === null) return schedule.noEventMs;
  return STATUS_INTERVALS[status] ?? schedule.defaultMs;
}

export function nextCheckAt(
  status: StatusNorm | null,
  now: number,
  schedule: ScheduleConfig = DEFAULT_SCHEDULE,
): number {
  return now + checkInterval(status, schedule);
}
