// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from "vitest";
import { TrackingAdapter } from "../src/adapter.ts";
import { cleanTrackingNumber, detectByPattern } from "../src/carriers.ts";
import { ProviderError } from "../src/provider.ts";
import { FakeProvider, makeLogger, v1Data } from "./fixtures.ts";

function keys(count: number) {
  return Array.from({ length: count }, (_, i) => ({
    tracking_number: `LP${String(i).padStart(9, "0")}CN`,
    carrier_code: "auto",
  }));
}

// ─── Signatures ───────────────────────────────────────────────────────────────

describe("detectByPattern", () => {
  it.each([
    ["RR123456789CN", "17track", [{ code: "2005", name: "China Post" }, { code: "2014", name: "Cainiao" }]],
    ["RR123456789IL", "17track", [{ code: "5", name: "Israel Post" }]],
    ["9400111899223397910435", "17track", [{ code: "21051", name: "USPS" }]],
    ["1234567890", "17track", [{ code: "6", name: "DHL" }]],
    ["123456789012", "trackingmore", [{ code: "fedex", name: "FedEx" }]],
    ["1Z999AA10123456784", "trackingmore", [{ code: "ups", name: "UPS" }]],
  ] as const)("%s on %s", (number, provider, expected) => {
    expect(detectByPattern(number, provider)).toEqual(expected);
  });

  it("normalizes case and whitespace before matching", () => {
    expect(detectByPattern("  rr123456789cn ", "trackingmore")[0]).toEqual({
      code: "china-post",
      name: "China Post",
    });
  });

  it("returns nothing for an unknown signature", () => {
    expect(detectByPattern("ABCDE12345XYZ", "17track")).toEqual([]);
  });
});

describe("cleanTrackingNumber", () => {
  it("upper-cases and trims", () => {
    expect(cleanTrackingNumber(" rr123456789cn ")).toBe("RR123456789CN");
  });

  it("rejects short, long and non-alphanumeric input", () => {
    expect(cleanTrackingNumber("AB12")).toBeNull();
    expect(cleanTrackingNumber("A".repeat(31))).toBeNull();
    expect(cleanTrackingNumber("RR-123456789")).toBeNull();
  });
});

// ─── TrackingAdapter ──────────────────────────────────────────────────────────

describe("TrackingAdapter.detectCarriers", () => {
  it("uses the provider's detection first", async () => {
    const provider = new FakeProvider();
    provider.detected = [{ code: "190271", name: "Cainiao Global" }];
    const adapter = new TrackingAdapter(provider, { batchSize: 40, logger: makeLogger() });

    expect(await adapter.detectCarriers("RR123456789CN")).toEqual([{ code: "190271", name: "Cainiao Global" }]);
  });

  it("falls back to signatures when detection is empty", async () => {
    const adapter = new TrackingAdapter(new FakeProvider(), { batchSize: 40, logger: makeLogger() });
    expect(await adapter.detectCarriers("RR123456789IL")).toEqual([{ code: "5", name: "Israel Post" }]);
  });

  it("falls back to signatures when detection throws", async () => {
    const provider = new FakeProvider();
    provider.detect = async () => {
      throw new ProviderError("down", "provider_unavailable");
    };
    const logger = makeLogger();
    const adapter = new TrackingAdapter(provider, { batchSize: 40, logger });

    expect(await adapter.detectCarriers("1Z999AA10123456784")).toEqual([{ code: "21037", name: "UPS" }]);
    expect(logger.warn).toHaveBeenCalledWith(
      "carrier detection failed, using signatures",
      expect.objectContaining({ error: "down" }),
    );
  });

  it("returns the auto candidate when nothing matches", async () => {
    const adapter = new TrackingAdapter(new FakeProvider(), { batchSize: 40, logger: makeLogger() });
    expect(await adapter.detectCarriers("ABCDE12345XYZ")).toEqual([{ code: "auto", name: "Auto Detect" }]);
  });
});

describe("TrackingAdapter.fetchBatch", () => {
  it("chunks to the configured batch size", async () => {
    const provider = new FakeProvider();
    const adapter = new TrackingAdapter(provider, { batchSize: 40, logger: makeLogger() });

    await adapter.fetchBatch(keys(95));

    expect(provider.fetchCalls.map((c) => c.length)).toEqual([40, 40, 15]);
  });

  it("maps payloads by tracking number and leaves missing numbers out", async () => {
    const provider = new FakeProvider();
    const [a, b] = keys(2);
    provider.payloads.set(a.tracking_number, v1Data(a.tracking_number, [{ a: "2025-01-17 10:00:00", z: "Posted" }]));
    const adapter = new TrackingAdapter(provider, { batchSize: 40, logger: makeLogger() });

    const result = await adapter.fetchBatch([a, b]);

    expect([...result.keys()]).toEqual([a.tracking_number]);
    expect(result.get(a.tracking_number)?.provider).toBe("17track");
  });

  it("throws for the whole batch when any chunk is rate limited", async () => {
    const provider = new FakeProvider();
    provider.failures.set(1, new ProviderError("slow down", "rate_limited", 30));
    const adapter = new TrackingAdapter(provider, { batchSize: 2, logger: makeLogger() });

    await expect(adapter.fetchBatch(keys(6))).rejects.toMatchObject({ code: "rate_limited" });
    expect(provider.fetchCalls).toHaveLength(2);
  });

  it("skips a failed chunk when another succeeds", async () => {
    const provider = new FakeProvider();
    const all = keys(4);
    for (const k of all) provider.payloads.set(k.tracking_number, v1Data(k.tracking_number, [{ z: "Posted" }]));
    provider.failures.set(0, new ProviderError("timeout", "provider_unavailable"));
    const logger = makeLogger();
    const adapter = new TrackingAdapter(provider, { batchSize: 2, logger });

    const result = await adapter.fetchBatch(all);

    expect([...result.keys()]).toEqual([all[2].tracking_number, all[3].tracking_number]);
    expect(logger.warn).toHaveBeenCalledWith(
      "batch chunk failed",
      expect.objectContaining({ chunk: 0, size: 2, error: "timeout" }),
    );
  });

  it("throws provider_unavailable when every chunk fails", async () => {
    const provider = new FakeProvider();
    provider.failures.set("all", new ProviderError("connection refused", "provider_unavailable"));
    const adapter = new TrackingAdapter(provider, { batchSize: 2, logger: makeLogger() });

    await expect(adapter.fetchBatch(keys(3))).rejects.toMatchObject({
      code: "provider_unavailable",
      message: "every batch chunk failed: connection refused",
    });
  });

  it("treats a malformed chunk as no data instead of a failure", async () => {
    const provider = new FakeProvider();
    provider.failures.set("all", new ProviderError("non-JSON body", "malformed_payload"));
    const logger = makeLogger();
    const adapter = new TrackingAdapter(provider, { batchSize: 40, logger });

    const result = await adapter.fetchBatch(keys(3));

    expect(result.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      "batch chunk malformed, treated as no data",
      expect.objectContaining({ chunk: 0, size: 3, error: "non-JSON body" }),
    );
  });

  it("does not count a malformed chunk toward the all-failed rule", async () => {
    const provider = new FakeProvider();
    provider.failures.set(0, new ProviderError("non-JSON body", "malformed_payload"));
    provider.failures.set(1, new ProviderError("timeout", "provider_unavailable"));
    const adapter = new TrackingAdapter(provider, { batchSize: 2, logger: makeLogger() });

    expect((await adapter.fetchBatch(keys(4))).size).toBe(0);
  });

  it("returns an empty map for no keys without calling the provider", async () => {
    const provider = new FakeProvider();
    const adapter = new TrackingAdapter(provider, { batchSize: 40, logger: makeLogger() });

    expect((await adapter.fetchBatch([])).size).toBe(0);
    expect(provider.fetchCalls).toHaveLength(0);
  });
});

describe("TrackingAdapter.fetchOne", () => {
  it("returns the payload for the number or undefined", async () => {
    const provider = new FakeProvider();
    provider.payloads.set("RR123456789CN", v1Data("RR123456789CN", [{ z: "Posted" }]));
    const adapter = new TrackingAdapter(provider, { batchSize: 40, logger: makeLogger() });

    expect((await adapter.fetchOne("RR123456789CN", "2005"))?.number).toBe("RR123456789CN");
    expect(await adapter.fetchOne("RR000000000CN", "2005")).toBeUndefined();
  });
});
