import { ForecastCacheKey, RawForecastPayload } from './interfaces/weather.interface';

export type ForecastPayloads = Map<string, RawForecastPayload>;

export interface ForecastCache {
  get(key: ForecastCacheKey): ForecastPayloads | undefined;
  set(key: ForecastCacheKey, payloads: ForecastPayloads): void;
  clear(): void;
}

interface CacheEntry {
  payloads: ForecastPayloads;
  expiresAt: number;
}

export function serializeCacheKey(key: ForecastCacheKey): string {
  return `${key.originZip}:${key.radiusMiles}:${key.date}:${key.unit}`;
}

/**
 * Process-local TTL cache of raw payloads per query. A TTL of 0 disables it.
 */
export class InMemoryForecastCache implements ForecastCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: ForecastCacheKey): ForecastPayloads | undefined {
    const cacheKey = serializeCacheKey(key);
    const entry = this.entries.get(cacheKey);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(cacheKey);
      return undefined;
    }
    return new Map(entry.payloads);
  }

  set(key: ForecastCacheKey, payloads: ForecastPayloads): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(serializeCacheKey(key), {
      payloads: new Map(payloads),
      expiresAt: this.now() + this.ttlMs,
    });
  }

  clear(): void {
    this.entries.clear();
  }
}
