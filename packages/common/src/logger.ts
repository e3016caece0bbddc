// SPDX-License-Identifier: Apache-2.0
import { getRequestId } from "./request-id.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_ORDER;
}

export interface Logger {
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  debug(msg: string, extra?: Record<string, unknown>): void;
  child(extra: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Minimum level written. Default: "info". */
  level?: LogLevel;
  /** Fields merged into every line. */
  baseExtra?: Record<string, unknown>;
}

function emit(
  level: LogLevel,
  minLevel: LogLevel,
  service: string,
  msg: string,
  baseExtra: Record<string, unknown>,
  extra?: Record<string, unknown>,
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const line = JSON.stringify({
    level,
    service,
    msg,
    request_id: getRequestId(),
    ts: new Date().toISOString(),
    ...baseExtra,
    ...extra,
  });

  process.stdout.write(`${line}\n`);
}

/** Serialise an unknown thrown value for a log line. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? "info";
  const baseExtra = options.baseExtra ?? {};
  return {
    debug(msg, extra) {
      emit("debug", minLevel, service, msg, baseExtra, extra);
    },
    info(msg, extra) {
      emit("info", minLevel, service, msg, baseExtra, extra);
    },
    warn(msg, extra) {
      emit("warn", minLevel, service, msg, baseExtra, extra);
    },
    error(msg, extra) {
      emit("error", minLevel, service, msg, baseExtra, extra);
    },
    child(extra) {
      return createLogger(service, { level: minLevel, baseExtra: { ...baseExtra, ...extra } });
    },
  };
}
