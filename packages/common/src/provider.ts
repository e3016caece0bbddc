// SPDX-License-Identifier: Apache-2.0
// ─── Provider base interface ─────────────────────────────────────────────────
//
// Every vendor integration implements this interface. Domain-specific
// contracts (TrackProvider) extend Provider<TConfig> with their own methods.

export interface ProviderHealth {
  /** Whether the provider is reachable and functional. */
  ok: boolean;
  /** Round-trip time for the health check in milliseconds. */
  latency_ms: number;
  /** Human-readable error details if ok is false. */
  message?: string;
}

export interface Provider {
  /** Vendor identifier (e.g. "17track", "trackingmore"). */
  readonly name: string;

  /**
   * Check whether the provider is reachable with the configured credentials.
   * Implementations make the lightest call the vendor offers.
   */
  healthCheck(): Promise<ProviderHealth>;

  /**
   * Release any resources held by this provider. Called on shutdown.
   * Optional; stateless HTTP providers omit it.
   */
  destroy?(): Promise<void>;
}
