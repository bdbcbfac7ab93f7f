import { AuthError } from "../domain/errors.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { PaymentProviderPort, ProviderCredentials } from "../ports/payment-provider.js";
import type { TokenCachePort } from "../ports/token-cache.js";

interface ProviderSessionOptions {
  clock: ClockPort;
  logger: Logger;
  skewSeconds: number;
}

/**
 * Hands out provider access tokens, reusing a cached one while it has more than `skewSeconds` of
 * life left. A token the provider rejects is dropped from the cache; the caller decides whether
 * to try again.
 */
export class ProviderSession {
  private readonly cacheKey: string;

  constructor(
    private readonly provider: PaymentProviderPort,
    private readonly credentials: ProviderCredentials,
    private readonly cache: TokenCachePort,
    private readonly options: ProviderSessionOptions,
  ) {
    this.cacheKey = `${provider.name}:${credentials.clientId}`;
  }

  async accessToken(): Promise<string> {
    const nowMs = Date.parse(this.options.clock.nowIso());
    const cached = await this.cache.get(this.cacheKey);
    if (cached && Date.parse(cached.expiresAt) - nowMs > this.options.skewSeconds * 1000) {
      return cached.value;
    }

    const token = await this.provider.authenticate(this.credentials);
    await this.cache.set(this.cacheKey, token, Date.parse(token.expiresAt) - nowMs);
    this.options.logger.debug({ provider: this.provider.name, expires_at: token.expiresAt }, "provider access token refreshed");
    return token.value;
  }

  async run<TResult>(operation: (token: string) => Promise<TResult>): Promise<TResult> {
    const token = await this.accessToken();
    try {
      return await operation(token);
    } catch (error) {
      if (error instanceof AuthError && error.tokenRejected) {
        await this.invalidate();
        this.options.logger.warn({ provider: this.provider.name }, "provider rejected cached access token");
      }
      throw error;
    }
  }

  async invalidate(): Promise<void> {
    await this.cache.delete(this.cacheKey);
  }
}
