// SPDX-License-Identifier: Apache-2.0
import { type Logger, errorMessage } from "@parcelwatch/common";
import type { CycleSummary, Reconciler } from "./reconcile.ts";

export interface PollerOptions {
  /** Timer period. Default: 2 min */
  intervalMs?: number;
  logger: Logger;
}

/**
 * Drives reconciliation cycles from one recurring timer. A tick that finds a
 * cycle still running is skipped, so cycles never overlap.
 */
export class Poller {
  private reconciler: Reconciler;
  private intervalMs: number;
  private logger: Logger;
  private handle: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<CycleSummary | null> | null = null;

  constructor(reconciler: Reconciler, options: PollerOptions) {
    this.reconciler = reconciler;
    this.intervalMs = options.intervalMs ?? 120_000;
    this.logger = options.logger;
  }

  get running(): boolean {
    return this.handle !== null;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  /** Returns false, and schedules nothing, when no provider is configured. */
  start(): boolean {
    if (this.handle) return true;
    if (!this.reconciler.configured) {
      this.logger.error("tracking provider not configured, polling disabled");
      return false;
    }
    this.handle = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.logger.info("poller started", { interval_ms: this.intervalMs });
    return true;
  }

  /** Clears the timer. A cycle in flight finishes on its own. */
  stop(): void {
    if (!this.handle) return;
    clearInterval(this.handle);
    this.handle = null;
    this.logger.info("poller stopped");
  }

  /** Run one cycle now unless one is already running. Resolves null when skipped or failed. */
  tick(): Promise<CycleSummary | null> {
    if (this.inFlight) {
      this.logger.warn("previous poll cycle still running, tick skipped");
      return Promise.resolve(null);
    }

    this.inFlight = this.reconciler
      .runCycle()
      .catch((err: unknown) => {
        this.logger.error("poll cycle failed", { error: errorMessage(err) });
        return null;
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }
}
