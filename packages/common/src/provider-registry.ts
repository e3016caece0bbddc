// SPDX-License-Identifier: Apache-2.0
// ─── ProviderRegistry ─────────────────────────────────────────────────────────
//
// Config-driven vendor selection and health-check-on-startup. Each package
// creates a registry typed to its own provider contract
// (e.g. ProviderRegistry<TrackProvider>).
//
// Selection order:
//   1. `selected` option (from configuration)
//   2. Provider registered with { default: true }
//   3. First registered provider

import { errorMessage, type Logger } from "./logger.ts";
import type { Provider, ProviderHealth } from "./provider.ts";

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ProviderRegistryOptions {
  /** Provider name chosen by configuration. Must be registered before get(). */
  selected?: string;
  /** Logger for startup health output. Silent when omitted. */
  logger?: Logger;
}

interface RegistryEntry<T> {
  name: string;
  factory: () => T | Promise<T>;
  isDefault: boolean;
  instance?: T;
}

// ─── ProviderRegistry ─────────────────────────────────────────────────────────

export class ProviderRegistry<T extends Provider> {
  private entries: Map<string, RegistryEntry<T>> = new Map();
  private readonly selected: string | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: ProviderRegistryOptions = {}) {
    this.selected = options.selected || undefined;
    this.logger = options.logger;
  }

  /**
   * Register a provider factory. The factory is called lazily on first use.
   * Only the first provider registered with `default: true` is the default.
   */
  register(name: string, factory: () => T | Promise<T>, opts: { default?: boolean } = {}): this {
    if (this.entries.has(name)) {
      throw new Error(`[ProviderRegistry] Provider "${name}" is already registered`);
    }
    const hasDefault = [...this.entries.values()].some((e) => e.isDefault);
    this.entries.set(name, {
      name,
      factory,
      isDefault: (opts.default ?? false) && !hasDefault,
    });
    return this;
  }

  /** Names of all registered providers in registration order. */
  list(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Resolve the provider instance for `name`, constructing it on first access.
   * Throws if the provider is not registered.
   */
  async resolve(name: string): Promise<T> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(
        `[ProviderRegistry] Unknown provider "${name}". Registered: ${this.list().join(", ") || "(none)"}`,
      );
    }
    if (!entry.instance) {
      entry.instance = await entry.factory();
    }
    return entry.instance;
  }

  /** Return the active provider. Throws if nothing is registered. */
  async get(): Promise<T> {
    return this.resolve(this.selectedName());
  }

  /** Name of the provider get() returns. */
  selectedName(): string {
    if (this.entries.size === 0) {
      throw new Error("[ProviderRegistry] No providers registered");
    }

    if (this.selected) {
      if (!this.entries.has(this.selected)) {
        throw new Error(
          `[ProviderRegistry] Configured provider "${this.selected}" is not registered. Registered: ${this.list().join(", ")}`,
        );
      }
      return this.selected;
    }

    for (const [name, entry] of this.entries) {
      if (entry.isDefault) return name;
    }

    const [first] = this.entries.keys();
    return first;
  }

  /**
   * Start-up sequence: health-check the selected provider and log the result.
   * An unhealthy provider is reported but does not stop start-up; it may
   * recover before the first poll.
   */
  async startup(): Promise<ProviderHealth> {
    const name = this.selectedName();
    let health: ProviderHealth;
    try {
      const instance = await this.resolve(name);
      health = await instance.healthCheck();
    } catch (err) {
      health = { ok: false, latency_ms: 0, message: errorMessage(err) };
    }

    if (health.ok) {
      this.logger?.info("provider healthy", { provider: name, latency_ms: health.latency_ms });
    } else {
      this.logger?.warn("provider unhealthy, service may be degraded", {
        provider: name,
        latency_ms: health.latency_ms,
        detail: health.message,
      });
    }
    return health;
  }

  /** Destroy all initialized provider instances. Call on shutdown. */
  async destroy(): Promise<void> {
    for (const entry of this.entries.values()) {
      if (entry.instance?.destroy) {
        await entry.instance.destroy();
      }
      entry.instance = undefined;
    }
  }
}
