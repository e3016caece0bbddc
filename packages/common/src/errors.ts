// SPDX-License-Identifier: Apache-2.0
/**
 * Shared error envelope helpers.
 *
 * Every HTTP error leaves the service in the same shape:
 *   { error: { code: string; message: string } }
 */

export interface ApiError {
  error: { code: string; message: string };
}

export function invalidRequest(message: string): ApiError {
  return { error: { code: "invalid_request", message } };
}

export function serviceError(code: string, message: string): ApiError {
  return { error: { code, message } };
}

/**
 * Discriminated result returned by service functions. HTTP handlers map the
 * failure branch onto a status code; other callers branch on `ok`.
 */
export type ServiceResult<T> =
  | { ok: true; data: T }
  | { ok: false; status: number; code: string; message: string; retryAfter?: number };

export function failure(
  status: number,
  code: string,
  message: string,
  retryAfter?: number,
): Extract<ServiceResult<never>, { ok: false }> {
  return retryAfter === undefined
    ? { ok: false, status, code, message }
    : { ok: false, status, code, message, retryAfter };
}
