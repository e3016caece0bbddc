// SPDX-License-Identifier: Apache-2.0
import { errorMessage } from "@parcelwatch/common";
import { ProviderError } from "./provider.ts";

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

/**
 * Vendor HTTP call with a timeout. Transport failures, 429 and 5xx become
 * ProviderErrors; any other status is returned for the caller to read.
 */
export async function requestJson(
  vendor: string,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<JsonResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let resp: Response;
  try {
    resp = await fetch(url, { ...init, signal: controller.signal });
  } catch (err) {
    throw new ProviderError(`${vendor} request failed: ${errorMessage(err)}`, "provider_unavailable");
  } finally {
    clearTimeout(timeout);
  }

  if (resp.status === 429) {
    const retryAfter = Number(resp.headers.get("Retry-After") ?? "60");
    throw new ProviderError(
      `${vendor} rate limit exceeded`,
      "rate_limited",
      Number.isFinite(retryAfter) ? retryAfter : 60,
    );
  }

  if (resp.status >= 500) {
    throw new ProviderError(`${vendor} API error: ${resp.status}`, "provider_unavailable");
  }

  let body: unknown;
  try {
    body = await resp.json();
  } catch {
    throw new ProviderError(`${vendor} returned a non-JSON body (${resp.status})`, "malformed_payload");
  }

  return { status: resp.status, ok: resp.ok, body };
}
