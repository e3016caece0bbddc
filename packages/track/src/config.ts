// SPDX-License-Identifier: Apache-2.0
import { readFileSync } from "node:fs";
import { type LogLevel, isLogLevel } from "@parcelwatch/common";
import { parse } from "yaml";
import { isRecord } from "./normalize/fields.ts";
import { type ProviderName, isProviderName } from "./provider.ts";
import { DEFAULT_SCHEDULE, type ScheduleConfig } from "./schedule.ts";

// ─── Shape ────────────────────────────────────────────────────────────────────

export interface ProviderConfig {
  name: ProviderName;
  apiKeys: Partial<Record<ProviderName, string>>;
  baseUrls: Partial<Record<ProviderName, string>>;
  /** Most tracking numbers per vendor request. Default: 40 */
  batchSize: number;
  timeoutMs: number;
}

export interface PollerConfig {
  /** Timer period. Default: 2 min */
  intervalMs: number;
  /** Most shipments selected per cycle. Default: 100 */
  batchCeiling: number;
}

export interface LimitsConfig {
  /** Active subscriptions per user. Default: 30 */
  maxActivePerUser: number;
  /** Registrations per user per minute. Default: 5 */
  addPerMinute: number;
  /** Minimum gap between manual refreshes of one shipment by one user. Default: 10 min */
  refreshCooldownMs: number;
}

export interface NotifierConfig {
  /** Front-end inbound URL. Notifications are only logged when unset. */
  webhookUrl?: string;
  webhookSecret?: string;
  timeoutMs: number;
}

export interface EngineConfig {
  port: number;
  logLevel: LogLevel;
  dbPath: string;
  provider: ProviderConfig;
  poller: PollerConfig;
  schedule: ScheduleConfig;
  limits: LimitsConfig;
  notifier: NotifierConfig;
}

export type ConfigOverrides = {
  [K in keyof EngineConfig]?: EngineConfig[K] extends object ? Partial<EngineConfig[K]> : EngineConfig[K];
};

// ─── Readers ──────────────────────────────────────────────────────────────────

function positiveInt(fallback: number, ...values: unknown[]): number {
  for (const value of values) {
    const n =
      typeof value === "number"
        ? value
        : typeof value === "string" && value.trim() !== ""
          ? Number(value)
          : Number.NaN;
    if (Number.isInteger(n) && n > 0) return n;
  }
  return fallback;
}

function text(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === "string" && value.trim() !== "") return value.trim();
  }
  return undefined;
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = root[key];
  return isRecord(value) ? value : {};
}

/** Parse a YAML config file. Throws when the file is unreadable or not a mapping. */
export function readConfigFile(path: string): Record<string, unknown> {
  const doc: unknown = parse(readFileSync(path, "utf-8"));
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new Error(`[config] ${path} must contain a YAML mapping`);
  }
  return doc;
}

// ─── loadConfig ───────────────────────────────────────────────────────────────

/**
 * Build the engine configuration. Later sources win: defaults, the YAML file
 * named by PARCELWATCH_CONFIG, environment variables, then `overrides`.
 * Invalid numbers fall back to the previous source.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): EngineConfig {
  const file = env.PARCELWATCH_CONFIG ? readConfigFile(env.PARCELWATCH_CONFIG) : {};
  const fileProvider = section(file, "provider");
  const fileKeys = section(fileProvider, "apiKeys");
  const fileUrls = section(fileProvider, "baseUrls");
  const filePoller = section(file, "poller");
  const fileSchedule = section(file, "schedule");
  const fileLimits = section(file, "limits");
  const fileNotifier = section(file, "notifier");

  const providerName = text(env.TRACKING_PROVIDER, fileProvider.name) ?? "17track";
  if (!isProviderName(providerName)) {
    throw new Error(`[config] Unknown tracking provider "${providerName}"`);
  }

  const logLevel = text(env.LOG_LEVEL, file.logLevel) ?? "info";

  const config: EngineConfig = {
    port: positiveInt(3000, env.PORT, file.port),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    dbPath: text(env.PARCELWATCH_DB_PATH, file.dbPath) ?? "./parcelwatch.db",
    provider: {
      name: providerName,
      apiKeys: {
        "17track": text(env.SEVENTEENTRACK_API_KEY, fileKeys["17track"]),
        trackingmore: text(env.TRACKINGMORE_API_KEY, fileKeys.trackingmore),
      },
      baseUrls: {
        "17track": text(env.SEVENTEENTRACK_BASE_URL, fileUrls["17track"]),
        trackingmore: text(env.TRACKINGMORE_BASE_URL, fileUrls.trackingmore),
      },
      batchSize: positiveInt(40, env.PROVIDER_BATCH_SIZE, fileProvider.batchSize),
      timeoutMs: positiveInt(15_000, env.PROVIDER_TIMEOUT_MS, fileProvider.timeoutMs),
    },
    poller: {
      intervalMs: positiveInt(120_000, env.POLL_INTERVAL_MS, filePoller.intervalMs),
      batchCeiling: positiveInt(100, env.POLL_BATCH_CEILING, filePoller.batchCeiling),
    },
    schedule: {
      noEventMs: positiveInt(DEFAULT_SCHEDULE.noEventMs, fileSchedule.noEventMs),
      noDataMs: positiveInt(DEFAULT_SCHEDULE.noDataMs, fileSchedule.noDataMs),
      defaultMs: positiveInt(DEFAULT_SCHEDULE.defaultMs, fileSchedule.defaultMs),
      rateLimitBackoffMs: positiveInt(
        DEFAULT_SCHEDULE.rateLimitBackoffMs,
        env.RATE_LIMIT_BACKOFF_MS,
        fileSchedule.rateLimitBackoffMs,
      ),
    },
    limits: {
      maxActivePerUser: positiveInt(30, env.MAX_ACTIVE_PER_USER, fileLimits.maxActivePerUser),
      addPerMinute: positiveInt(5, env.ADD_RATE_LIMIT, fileLimits.addPerMinute),
      refreshCooldownMs: positiveInt(600_000, env.REFRESH_COOLDOWN_MS, fileLimits.refreshCooldownMs),
    },
    notifier: {
      webhookUrl: text(env.NOTIFY_WEBHOOK_URL, fileNotifier.webhookUrl),
      webhookSecret: text(env.NOTIFY_WEBHOOK_SECRET, fileNotifier.webhookSecret),
      timeoutMs: positiveInt(10_000, env.NOTIFY_TIMEOUT_MS, fileNotifier.timeoutMs),
    },
  };

  return {
    port: overrides.port ?? config.port,
    logLevel: overrides.logLevel ?? config.logLevel,
    dbPath: overrides.dbPath ?? config.dbPath,
    provider: { ...config.provider, ...overrides.provider },
    poller: { ...config.poller, ...overrides.poller },
    schedule: { ...config.schedule, ...overrides.schedule },
    limits: { ...config.limits, ...overrides.limits },
    notifier: { ...config.notifier, ...overrides.notifier },
  };
}
