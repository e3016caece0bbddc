// SPDX-License-Identifier: Apache-2.0
import { type Logger, ProviderRegistry } from "@parcelwatch/common";
import type { ProviderConfig } from "./config.ts";
import type { TrackProvider } from "./provider.ts";
import { SeventeenTrackClient } from "./seventeentrack.ts";
import { TrackingMoreClient } from "./trackingmore.ts";

/**
 * Registry of every vendor client. Configuration picks one by name; 17TRACK
 * is the default.
 */
export function createProviderRegistry(
  config: ProviderConfig,
  logger?: Logger,
): ProviderRegistry<TrackProvider> {
  const registry = new ProviderRegistry<TrackProvider>({ selected: config.name, logger });
  registry.register(
    "17track",
    () =>
      new SeventeenTrackClient({
        apiKey: config.apiKeys["17track"] ?? "",
        baseUrl: config.baseUrls["17track"],
        timeoutMs: config.timeoutMs,
      }),
    { default: true },
  );
  registry.register(
    "trackingmore",
    () =>
      new TrackingMoreClient({
        apiKey: config.apiKeys.trackingmore ?? "",
        baseUrl: config.baseUrls.trackingmore,
        timeoutMs: config.timeoutMs,
      }),
  );
  return registry;
}

/** Whether the selected vendor has credentials. */
export function isProviderConfigured(config: ProviderConfig): boolean {
  return Boolean(config.apiKeys[config.name]);
}
