// SPDX-License-Identifier: Apache-2.0
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { normalizePayload } from "../src/normalize/index.ts";
import { SeventeenTrackClient } from "../src/seventeentrack.ts";

const BASE = "https://api.17track.net/track/v1";

const mockFetch = vi.fn<typeof fetch>();

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function sentBody(call = 0): unknown {
  return JSON.parse(String(mockFetch.mock.calls[call]?.[1]?.body));
}

let client: SeventeenTrackClient;

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal("fetch", mockFetch);
  client = new SeventeenTrackClient({ apiKey: "test-key" });
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("SeventeenTrackClient", () => {
  it("requires an API key", () => {
    expect(() => new SeventeenTrackClient({ apiKey: "" })).toThrow(
      expect.objectContaining({ code: "not_configured" }),
    );
  });

  it("has no detection endpoint", async () => {
    expect(await client.detect()).toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  describe("register", () => {
    it("posts the number with a numeric carrier id and the token header", async () => {
      mockFetch.mockResolvedValueOnce(json({ code: 0, data: { accepted: [{ number: "RR123456789CN" }], rejected: [] } }));

      const ok = await client.register({ tracking_number: "RR123456789CN", carrier_code: "2005" });

      expect(ok).toBe(true);
      expect(mockFetch).toHaveBeenCalledWith(
        `${BASE}/register`,
        expect.objectContaining({
          method: "POST",
          headers: { "17token": "test-key", "Content-Type": "application/json" },
        }),
      );
      expect(sentBody()).toEqual([{ number: "RR123456789CN", carrier: 2005 }]);
    });

    it("sends carrier 0 for auto detection", async () => {
      mockFetch.mockResolvedValueOnce(json({ code: 0, data: { accepted: [{ number: "RR123456789CN" }] } }));

      await client.register({ tracking_number: "RR123456789CN", carrier_code: "auto" });

      expect(sentBody()).toEqual([{ number: "RR123456789CN", carrier: 0 }]);
    });

    it("treats an already registered number as success", async () => {
      mockFetch.mockResolvedValueOnce(
        json({
          code: 0,
          data: {
            accepted: [],
            rejected: [{ number: "RR123456789CN", error: { code: -18019901, message: "registered" } }],
          },
        }),
      );

      expect(await client.register({ tracking_number: "RR123456789CN", carrier_code: "2005" })).toBe(true);
    });

    it("returns false for any other rejection", async () => {
      mockFetch.mockResolvedValueOnce(
        json({
          code: 0,
          data: {
            accepted: [],
            rejected: [{ number: "RR123456789CN", error: { code: -18010012, message: "invalid number" } }],
          },
        }),
      );

      expect(await client.register({ tracking_number: "RR123456789CN", carrier_code: "2005" })).toBe(false);
    });
  });

  describe("fetch", () => {
    it("returns accepted entries as payloads", async () => {
      mockFetch.mockResolvedValueOnce(
        json({
          code: 0,
          data: {
            accepted: [
              {
                number: "RR123456789CN",
                track: { b: 10, z0: { a: "2025-01-16 08:00", z: "Shipment information received", c: "Shenzhen" } },
              },
            ],
            rejected: [{ number: "RR000000000CN", error: { code: -18019902 } }],
          },
        }),
      );

      const payloads = await client.fetch([
        { tracking_number: "RR123456789CN", carrier_code: "2005" },
        { tracking_number: "RR000000000CN", carrier_code: "2005" },
      ]);

      expect(payloads.map((p) => p.number)).toEqual(["RR123456789CN"]);
      expect(mockFetch.mock.calls[0]?.[0]).toBe(`${BASE}/gettrackinfo`);
      expect(normalizePayload(payloads[0]).event).toMatchObject({
        status_raw: "Shipment information received",
        status_norm: "INFO_RECEIVED",
        timestamp: "2025-01-16T08:00:00.000Z",
        location: "Shenzhen",
      });
    });

    it("skips the request for no keys", async () => {
      expect(await client.fetch([])).toEqual([]);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("fails on a non-zero body code", async () => {
      mockFetch.mockResolvedValueOnce(json({ code: -1, data: {} }));

      await expect(client.fetch([{ tracking_number: "RR123456789CN", carrier_code: "2005" }])).rejects.toMatchObject({
        code: "provider_unavailable",
      });
    });

    it("maps 429 to rate_limited with Retry-After", async () => {
      mockFetch.mockResolvedValueOnce(json({ code: -1 }, 429, { "Retry-After": "30" }));

      await expect(client.fetch([{ tracking_number: "RR123456789CN", carrier_code: "2005" }])).rejects.toMatchObject({
        code: "rate_limited",
        retryAfter: 30,
      });
    });

    it("maps 5xx to provider_unavailable", async () => {
      mockFetch.mockResolvedValueOnce(json({}, 503));

      await expect(client.fetch([{ tracking_number: "RR123456789CN", carrier_code: "2005" }])).rejects.toMatchObject({
        code: "provider_unavailable",
        message: "17TRACK API error: 503",
      });
    });

    it("maps a non-JSON body to malformed_payload", async () => {
      mockFetch.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

      await expect(client.fetch([{ tracking_number: "RR123456789CN", carrier_code: "2005" }])).rejects.toMatchObject({
        code: "malformed_payload",
      });
    });

    it("maps a transport failure to provider_unavailable", async () => {
      mockFetch.mockRejectedValueOnce(new Error("connection refused"));

      await expect(client.fetch([{ tracking_number: "RR123456789CN", carrier_code: "2005" }])).rejects.toMatchObject({
        code: "provider_unavailable",
        message: "17TRACK request failed: connection refused",
      });
    });
  });

  describe("healthCheck", () => {
    it("is healthy when the vendor answers code 0", async () => {
      mockFetch.mockResolvedValueOnce(json({ code: 0, data: { accepted: [], rejected: [] } }));
      expect((await client.healthCheck()).ok).toBe(true);
    });

    it("is unhealthy when the request fails", async () => {
      mockFetch.mockRejectedValueOnce(new Error("connection refused"));

      const health = await client.healthCheck();

      expect(health.ok).toBe(false);
      expect(health.message).toBe("17TRACK request failed: connection refused");
    });
  });
});
