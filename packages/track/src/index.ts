// SPDX-License-Identifier: Apache-2.0
import {
  type Logger,
  type Metrics,
  type ServiceResult,
  createServiceApp,
  invalidRequest,
  serviceError,
} from "@parcelwatch/common";
import type { Context } from "hono";
import type { RegisterShipmentRequest, RenameSubscriptionRequest, ShipmentState } from "./api.ts";
import type { Poller } from "./poller.ts";
import {
  type ServiceContext,
  archiveForUser,
  detectCarriers,
  listShipments,
  refreshShipment,
  registerShipment,
  remove,
  renameSubscription,
  restore,
  shipmentHistory,
  toggleMute,
} from "./service.ts";

export interface AppDeps {
  service: ServiceContext;
  metrics: Metrics;
  logger: Logger;
  poller?: Poller;
}

const ERROR_STATUSES = [400, 403, 404, 409, 429, 500, 502, 503] as const;

type ErrorStatus = (typeof ERROR_STATUSES)[number];

function errorStatus(status: number): ErrorStatus {
  return ERROR_STATUSES.find((s) => s === status) ?? 500;
}

// Failures leave as the shared error envelope; 429 also carries Retry-After.
function respond<T extends object>(c: Context, result: ServiceResult<T>, okStatus: 200 | 201 = 200) {
  if (result.ok) return c.json(result.data, okStatus);
  if (result.status === 429) {
    c.header("Retry-After", String(result.retryAfter ?? 60));
  }
  return c.json(serviceError(result.code, result.message), errorStatus(result.status));
}

async function readJson<T>(c: Context, logger: Logger): Promise<T | null> {
  try {
    return await c.req.json<T>();
  } catch (err) {
    logger.warn("JSON parse failed", { path: c.req.path, error: String(err) });
    return null;
  }
}

function parseState(value: string | undefined): ShipmentState | undefined | null {
  if (value === undefined || value === "") return undefined;
  return value === "active" || value === "archived" ? value : null;
}

export function createApp(deps: AppDeps) {
  const { service, logger } = deps;

  const app = createServiceApp({
    serviceName: "parcelwatch",
    metrics: deps.metrics,
    logger,
    health: () => ({
      provider: service.adapter?.provider.name ?? null,
      polling: deps.poller?.running ?? false,
    }),
  });

  // GET /v1/carriers?tracking_number=: candidate carriers
  app.get("/v1/carriers", async (c) => {
    const result = await detectCarriers(service, c.req.query("tracking_number") ?? "");
    return respond(c, result);
  });

  // POST /v1/shipments: register and subscribe
  app.post("/v1/shipments", async (c) => {
    const body = await readJson<RegisterShipmentRequest>(c, logger);
    if (!body) return c.json(invalidRequest("Invalid JSON body"), 400);
    const result = await registerShipment(service, body);
    return respond(c, result, result.ok && result.data.created ? 201 : 200);
  });

  // POST /v1/shipments/:id/refresh: manual refresh
  app.post("/v1/shipments/:id/refresh", async (c) => {
    const body = (await readJson<{ user_id?: unknown }>(c, logger)) ?? {};
    const userId = typeof body.user_id === "string" ? body.user_id : undefined;
    return respond(c, await refreshShipment(service, c.req.param("id"), { userId }));
  });

  // GET /v1/shipments/:id/events: recorded changes, newest first
  app.get("/v1/shipments/:id/events", async (c) => {
    const limit = Number(c.req.query("limit") ?? "20");
    return respond(c, await shipmentHistory(service, c.req.param("id"), limit));
  });

  // GET /v1/users/:userId/shipments?state=: a user's subscriptions
  app.get("/v1/users/:userId/shipments", async (c) => {
    const state = parseState(c.req.query("state"));
    if (state === null) return c.json(invalidRequest("state must be active or archived"), 400);
    return respond(c, await listShipments(service, c.req.param("userId"), state));
  });

  app.post("/v1/users/:userId/shipments/:id/mute", async (c) =>
    respond(c, await toggleMute(service, c.req.param("userId"), c.req.param("id"))),
  );

  app.post("/v1/users/:userId/shipments/:id/archive", async (c) =>
    respond(c, await archiveForUser(service, c.req.param("userId"), c.req.param("id"))),
  );

  app.post("/v1/users/:userId/shipments/:id/restore", async (c) =>
    respond(c, await restore(service, c.req.param("userId"), c.req.param("id"))),
  );

  // PATCH /v1/users/:userId/shipments/:id: rename
  app.patch("/v1/users/:userId/shipments/:id", async (c) => {
    const body = await readJson<RenameSubscriptionRequest>(c, logger);
    if (!body) return c.json(invalidRequest("Invalid JSON body"), 400);
    return respond(
      c,
      await renameSubscription(service, c.req.param("userId"), c.req.param("id"), body.item_name),
    );
  });

  app.delete("/v1/users/:userId/shipments/:id", async (c) =>
    respond(c, await remove(service, c.req.param("userId"), c.req.param("id"))),
  );

  return app;
}
