// SPDX-License-Identifier: Apache-2.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}

const als = new AsyncLocalStorage<string>();

/**
 * Returns the request ID for the current async context, or null outside one.
 */
export function getRequestId(): string | null {
  return als.getStore() ?? null;
}

export function newRequestId(prefix = ""): string {
  return `${prefix}${randomUUID().slice(0, 12)}`;
}

/**
 * Run `fn` with `id` as the ambient request ID. Background work (poll cycles)
 * uses this so its log lines correlate the same way HTTP requests do.
 */
export function withRequestId<T>(id: string, fn: () => Promise<T>): Promise<T> {
  return als.run(id, fn);
}

/**
 * Hono middleware that assigns a request ID to each request.
 * Reads `X-Request-Id` when present, otherwise generates one, and echoes it
 * back in the response header.
 */
export function requestIdMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const id = c.req.header("x-request-id") ?? newRequestId();
    c.set("requestId", id);
    c.header("X-Request-Id", id);
    await als.run(id, next);
  };
}
