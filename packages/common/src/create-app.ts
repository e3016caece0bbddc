// SPDX-License-Identifier: Apache-2.0
/**
 * createServiceApp: shared Hono factory.
 *
 * Middleware order:
 *   1. requestIdMiddleware
 *   2. bodyLimit (1 MB)
 *   3. metricsMiddleware
 *   4. GET /            health check
 *   5. GET /v1/metrics  operational metrics
 *
 * Callers add their domain routes to the returned app.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { serviceError } from "./errors.ts";
import { errorMessage, type Logger } from "./logger.ts";
import { type Metrics, metricsHandler, metricsMiddleware } from "./metrics.ts";
import { requestIdMiddleware } from "./request-id.ts";

export type AppVariables = { requestId: string };

export interface ServiceAppConfig {
  serviceName: string;
  metrics: Metrics;
  logger: Logger;
  /** Extra fields merged into the health response. */
  health?: () => Record<string, unknown>;
  /** Max request body in bytes. Default: 1 MB */
  maxBodyBytes?: number;
}

export function createServiceApp(config: ServiceAppConfig): Hono<{ Variables: AppVariables }> {
  const { serviceName, metrics, logger } = config;
  const app = new Hono<{ Variables: AppVariables }>();

  app.use("*", requestIdMiddleware());

  app.use(
    "*",
    bodyLimit({
      maxSize: config.maxBodyBytes ?? 1024 * 1024,
      onError: (c) => c.json(serviceError("payload_too_large", "Request too large"), 413),
    }),
  );

  app.use("*", metricsMiddleware(metrics));

  app.onError((err, c) => {
    logger.error("unhandled request error", {
      method: c.req.method,
      path: c.req.path,
      error: errorMessage(err),
    });
    return c.json(serviceError("internal_error", "Internal server error"), 500);
  });

  app.get("/", (c) => c.json({ service: serviceName, status: "ok", ...config.health?.() }));
  app.get("/v1/metrics", metricsHandler(metrics, serviceName));

  return app;
}
