// SPDX-License-Identifier: Apache-2.0
import type { Handler, MiddlewareHandler } from "hono";

const MAX_LATENCY_SAMPLES = 1000;

interface EndpointMetrics {
  count: number;
  errors: number;
  latencies: number[];
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, idx)];
}

/**
 * In-process metrics: HTTP endpoint timings plus named counters that
 * background work increments (poll cycles, notifications).
 */
export class Metrics {
  private readonly startTime = Date.now();
  private readonly endpoints = new Map<string, EndpointMetrics>();
  private readonly errorsByStatus = new Map<number, number>();
  private readonly counters = new Map<string, number>();
  private totalRequests = 0;
  private totalErrors = 0;

  increment(counter: string, by = 1): void {
    this.counters.set(counter, (this.counters.get(counter) ?? 0) + by);
  }

  counter(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  recordRequest(key: string, status: number, latencyMs: number): void {
    let ep = this.endpoints.get(key);
    if (!ep) {
      ep = { count: 0, errors: 0, latencies: [] };
      this.endpoints.set(key, ep);
    }
    ep.count++;
    this.totalRequests++;

    if (ep.latencies.length >= MAX_LATENCY_SAMPLES) {
      ep.latencies.shift();
    }
    ep.latencies.push(latencyMs);

    if (status >= 400) {
      ep.errors++;
      this.totalErrors++;
      this.errorsByStatus.set(status, (this.errorsByStatus.get(status) ?? 0) + 1);
    }
  }

  snapshot(serviceName: string) {
    const byEndpoint: Record<
      string,
      { count: number; errors: number; p50_ms: number; p99_ms: number }
    > = {};
    for (const [key, ep] of this.endpoints) {
      const sorted = [...ep.latencies].sort((a, b) => a - b);
      byEndpoint[key] = {
        count: ep.count,
        errors: ep.errors,
        p50_ms: percentile(sorted, 50),
        p99_ms: percentile(sorted, 99),
      };
    }

    const byStatus: Record<string, number> = {};
    for (const [status, count] of this.errorsByStatus) {
      byStatus[String(status)] = count;
    }

    return {
      service: serviceName,
      uptime_s: Math.floor((Date.now() - this.startTime) / 1000),
      requests: {
        total: this.totalRequests,
        by_endpoint: byEndpoint,
      },
      errors: {
        total: this.totalErrors,
        by_status: byStatus,
      },
      counters: Object.fromEntries(this.counters),
    };
  }
}

export function metricsMiddleware(metrics: Metrics): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    await next();
    const path = c.req.routePath ?? new URL(c.req.url).pathname;
    metrics.recordRequest(`${c.req.method} ${path}`, c.res.status, Date.now() - start);
  };
}

export function metricsHandler(metrics: Metrics, serviceName: string): Handler {
  return (c) => c.json(metrics.snapshot(serviceName));
}
