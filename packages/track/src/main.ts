// SPDX-License-Identifier: Apache-2.0
import { serve } from "@hono/node-server";
import { Metrics, createLogger, errorMessage } from "@parcelwatch/common";
import { TrackingAdapter } from "./adapter.ts";
import { loadConfig } from "./config.ts";
import { SqliteShipmentStore } from "./db.ts";
import { createApp } from "./index.ts";
import { LogNotifier, type Notifier, WebhookNotifier } from "./notify.ts";
import { Poller } from "./poller.ts";
import { createProviderRegistry, isProviderConfigured } from "./providers.ts";
import { Reconciler } from "./reconcile.ts";
import { createServiceContext } from "./service.ts";

const config = loadConfig();
const logger = createLogger("parcelwatch", { level: config.logLevel });
const metrics = new Metrics();
const store = new SqliteShipmentStore(config.dbPath);

const registry = createProviderRegistry(config.provider, logger);
let adapter: TrackingAdapter | null = null;
if (isProviderConfigured(config.provider)) {
  await registry.startup();
  adapter = new TrackingAdapter(await registry.get(), {
    batchSize: config.provider.batchSize,
    logger,
  });
} else {
  logger.error("tracking provider credentials missing, running degraded", {
    provider: config.provider.name,
  });
}

const notifier: Notifier = config.notifier.webhookUrl
  ? new WebhookNotifier({
      url: config.notifier.webhookUrl,
      secret: config.notifier.webhookSecret,
      timeoutMs: config.notifier.timeoutMs,
    })
  : new LogNotifier(logger.child({ module: "notify" }));

const reconciler = new Reconciler({
  store,
  adapter,
  notifier,
  logger: logger.child({ module: "reconcile" }),
  metrics,
  schedule: config.schedule,
  batchCeiling: config.poller.batchCeiling,
});

const poller = new Poller(reconciler, { intervalMs: config.poller.intervalMs, logger });
const service = createServiceContext({ store, reconciler, adapter, logger, limits: config.limits });
const app = createApp({ service, metrics, logger, poller });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info("listening", { port: info.port, provider: config.provider.name });
});
poller.start();

async function shutdown(signal: string): Promise<void> {
  logger.info("shutting down", { signal });
  poller.stop();
  server.close();
  try {
    await registry.destroy();
  } catch (err) {
    logger.error("provider shutdown failed", { error: errorMessage(err) });
  }
  store.close();
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
