import type { ProviderAccessToken } from "./payment-provider.js";

export interface TokenCachePort {
  get(key: string): Promise<ProviderAccessToken | null>;
  set(key: string, token: ProviderAccessToken, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  close?(): Promise<void>;
}
