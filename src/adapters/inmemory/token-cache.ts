import type { ClockPort } from "../../infra/clock.js";
import { SystemClock } from "../../infra/clock.js";
import type { ProviderAccessToken } from "../../ports/payment-provider.js";
import type { TokenCachePort } from "../../ports/token-cache.js";

interface CacheEntry {
  token: ProviderAccessToken;
  evictAtMs: number;
}

export class InMemoryTokenCache implements TokenCachePort {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly clock: ClockPort = new SystemClock()) {}

  async get(key: string): Promise<ProviderAccessToken | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (Date.parse(this.clock.nowIso()) >= entry.evictAtMs) {
      this.entries.delete(key);
      return null;
    }
    return { ...entry.token };
  }

  async set(key: string, token: ProviderAccessToken, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, {
      token: { ...token },
      evictAtMs: Date.parse(this.clock.nowIso()) + ttlMs,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}
