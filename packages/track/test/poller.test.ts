// SPDX-License-Identifier: Apache-2.0
import { afterEach, describe, expect, it, vi } from "vitest";
import { Poller } from "../src/poller.ts";
import { ProviderError } from "../src/provider.ts";
import { type TestEngine, createTestEngine } from "./fixtures.ts";

let engines: TestEngine[] = [];

function setup(options: { configured?: boolean } = {}): TestEngine {
  const engine = createTestEngine(options);
  engines.push(engine);
  return engine;
}

afterEach(() => {
  for (const engine of engines) engine.store.close();
  engines = [];
  vi.useRealTimers();
});

describe("Poller", () => {
  it("refuses to start without a provider", () => {
    const engine = setup({ configured: false });
    const poller = new Poller(engine.reconciler, { logger: engine.logger });

    expect(poller.start()).toBe(false);
    expect(poller.running).toBe(false);
    expect(engine.logger.error).toHaveBeenCalledWith("tracking provider not configured, polling disabled");
  });

  it("skips a tick while a cycle is still running", async () => {
    const engine = setup();
    engine.store.createShipment({ tracking_number: "RR123456789CN", carrier_code: "2005", carrier_candidates: [], now: 0 });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fetchAll = engine.provider.fetch.bind(engine.provider);
    engine.provider.fetch = async (keys) => {
      await gate;
      return fetchAll(keys);
    };
    const poller = new Poller(engine.reconciler, { logger: engine.logger });

    const first = poller.tick();
    expect(poller.busy).toBe(true);
    expect(await poller.tick()).toBeNull();
    expect(engine.logger.warn).toHaveBeenCalledWith("previous poll cycle still running, tick skipped");

    release();
    expect((await first)?.selected).toBe(1);
    expect(poller.busy).toBe(false);
    expect(engine.provider.fetchCalls).toHaveLength(1);
  });

  it("resolves null when a cycle throws", async () => {
    const engine = setup();
    engine.store.createShipment({ tracking_number: "RR123456789CN", carrier_code: "2005", carrier_candidates: [], now: 0 });
    const poller = new Poller(engine.reconciler, { logger: engine.logger });
    vi.spyOn(engine.reconciler, "runCycle").mockRejectedValueOnce(new ProviderError("boom"));

    expect(await poller.tick()).toBeNull();
    expect(engine.logger.error).toHaveBeenCalledWith("poll cycle failed", { error: "boom" });
    expect(poller.busy).toBe(false);
  });

  it("runs a cycle on every interval until stopped", async () => {
    vi.useFakeTimers();
    const engine = setup();
    const poller = new Poller(engine.reconciler, { intervalMs: 1000, logger: engine.logger });
    const runCycle = vi.spyOn(engine.reconciler, "runCycle");

    expect(poller.start()).toBe(true);
    await vi.advanceTimersByTimeAsync(3000);
    poller.stop();
    await vi.advanceTimersByTimeAsync(3000);

    expect(runCycle).toHaveBeenCalledTimes(3);
    expect(poller.running).toBe(false);
  });
});
