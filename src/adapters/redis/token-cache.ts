import type { Redis } from "ioredis";
import type { ProviderAccessToken } from "../../ports/payment-provider.js";
import type { TokenCachePort } from "../../ports/token-cache.js";

interface RedisTokenCacheOptions {
  keyPrefix: string;
}

function parseCachedToken(raw: string): ProviderAccessToken | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) {
    return null;
  }
  const value: unknown = Reflect.get(parsed, "value");
  const expiresAt: unknown = Reflect.get(parsed, "expiresAt");
  if (typeof value !== "string" || typeof expiresAt !== "string") {
    return null;
  }
  return { value, expiresAt };
}

/** Shares provider access tokens between processes. Entries expire through Redis TTLs. */
export class RedisTokenCache implements TokenCachePort {
  constructor(
    private readonly redis: Redis,
    private readonly options: RedisTokenCacheOptions,
  ) {}

  async get(key: string): Promise<ProviderAccessToken | null> {
    const raw = await this.redis.get(this.redisKey(key));
    if (raw === null) {
      return null;
    }
    return parseCachedToken(raw);
  }

  async set(key: string, token: ProviderAccessToken, ttlMs: number): Promise<void> {
    const ttl = Math.floor(ttlMs);
    if (ttl <= 0) {
      await this.redis.del(this.redisKey(key));
      return;
    }
    await this.redis.set(this.redisKey(key), JSON.stringify(token), "PX", ttl);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.redisKey(key));
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private redisKey(key: string): string {
    return `${this.options.keyPrefix}:${key}`;
  }
}
