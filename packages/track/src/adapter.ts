// SPDX-License-Identifier: Apache-2.0
import { type Logger, errorMessage } from "@parcelwatch/common";
import type { CanonicalEvent, CarrierCandidate, NormalizedEvent, TrackingKey } from "./api.ts";
import { AUTO_CARRIER } from "./api.ts";
import { detectByPattern } from "./carriers.ts";
import { normalizePayload, payloadHistory } from "./normalize/index.ts";
import { ProviderError } from "./provider.ts";
import type { RawPayload, TrackProvider } from "./provider.ts";

export interface TrackingAdapterOptions {
  /** Most keys per vendor request. */
  batchSize: number;
  logger: Logger;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * The one tracking contract the engine uses. Wraps whichever vendor client
 * configuration selected; nothing above this layer sees a wire format.
 */
export class TrackingAdapter {
  readonly provider: TrackProvider;
  private batchSize: number;
  private logger: Logger;

  constructor(provider: TrackProvider, options: TrackingAdapterOptions) {
    this.provider = provider;
    this.batchSize = Math.max(1, options.batchSize);
    this.logger = options.logger.child({ provider: provider.name });
  }

  /**
   * Vendor detection first, then the signature table, then the generic
   * "auto" candidate. Never empty, never throws for a vendor failure.
   */
  async detectCarriers(trackingNumber: string): Promise<CarrierCandidate[]> {
    try {
      const detected = await this.provider.detect(trackingNumber);
      if (detected.length > 0) return detected;
    } catch (err) {
      this.logger.warn("carrier detection failed, using signatures", {
        tracking_number: trackingNumber,
        error: errorMessage(err),
      });
    }

    const matched = detectByPattern(trackingNumber, this.provider.name);
    return matched.length > 0 ? matched : [AUTO_CARRIER];
  }

  register(trackingNumber: string, carrierCode: string): Promise<boolean> {
    return this.provider.register({ tracking_number: trackingNumber, carrier_code: carrierCode });
  }

  async fetchOne(trackingNumber: string, carrierCode: string): Promise<RawPayload | undefined> {
    const payloads = await this.provider.fetch([
      { tracking_number: trackingNumber, carrier_code: carrierCode },
    ]);
    return payloads.find((p) => p.number.toUpperCase() === trackingNumber.toUpperCase());
  }

  /**
   * Fetch many keys in vendor-sized chunks. A rate limit on any chunk throws
   * for the whole batch. A malformed chunk yields no payloads, so its keys
   * take the no-data path. Other failed chunks are skipped unless every chunk
   * failed.
   */
  async fetchBatch(keys: TrackingKey[]): Promise<Map<string, RawPayload>> {
    const results = new Map<string, RawPayload>();
    const chunks = chunk(keys, this.batchSize);
    let failures = 0;
    let lastError: unknown;

    for (const [index, keysInChunk] of chunks.entries()) {
      try {
        const payloads = await this.provider.fetch(keysInChunk);
        for (const payload of payloads) {
          results.set(payload.number.toUpperCase(), payload);
        }
      } catch (err) {
        if (err instanceof ProviderError && err.code === "rate_limited") throw err;
        if (err instanceof ProviderError && err.code === "malformed_payload") {
          this.logger.warn("batch chunk malformed, treated as no data", {
            chunk: index,
            size: keysInChunk.length,
            error: err.message,
          });
          continue;
        }
        failures++;
        lastError = err;
        this.logger.warn("batch chunk failed", {
          chunk: index,
          size: keysInChunk.length,
          error: errorMessage(err),
        });
      }
    }

    if (chunks.length > 0 && failures === chunks.length) {
      throw new ProviderError(
        `every batch chunk failed: ${errorMessage(lastError)}`,
        "provider_unavailable",
      );
    }
    return results;
  }

  normalize(payload: RawPayload): NormalizedEvent {
    return normalizePayload(payload);
  }

  history(payload: RawPayload): CanonicalEvent[] {
    return payloadHistory(payload);
  }
}
