import { describe, expect, it } from "vitest";
import { InMemoryTokenCache } from "../src/adapters/inmemory/token-cache.js";
import { FakeMonCashProvider } from "../src/adapters/providers/fake-moncash-provider.js";
import { ProviderSession } from "../src/application/provider-session.js";
import { AuthError, ProviderError } from "../src/domain/errors.js";
import { createNoopLogger } from "../src/infra/logger.js";
import { ManualClock } from "./support.js";

function createSession() {
  const clock = new ManualClock();
  const provider = new FakeMonCashProvider({ clock });
  const cache = new InMemoryTokenCache(clock);
  const session = new ProviderSession(
    provider,
    { clientId: "test-client", clientSecret: "test-secret" },
    cache,
    { clock, logger: createNoopLogger(), skewSeconds: 5 },
  );
  return { clock, provider, cache, session };
}

describe("ProviderSession", () => {
  it("reuses a cached token until it is about to expire", async () => {
    const { clock, provider, session } = createSession();

    const first = await session.accessToken();
    clock.advanceSeconds(50);
    const reused = await session.accessToken();
    clock.advanceSeconds(5);
    const refreshed = await session.accessToken();

    expect(reused).toBe(first);
    expect(refreshed).not.toBe(first);
    expect(provider.authenticateCalls).toBe(2);
  });

  it("stores tokens under the provider and client id", async () => {
    const { cache, session } = createSession();

    const token = await session.accessToken();
    await expect(cache.get("moncash:test-client")).resolves.toEqual({
      value: token,
      expiresAt: "2026-03-15T12:00:59.000Z",
    });
  });

  it("drops a token the provider rejects", async () => {
    const { cache, provider, session } = createSession();
    await session.accessToken();
    provider.revokeIssuedTokens();

    const failure = session.run((token) => provider.createPayment(token, { orderId: "ORD-000000000001", amount: 1000 }));
    await expect(failure).rejects.toBeInstanceOf(AuthError);
    await expect(cache.get("moncash:test-client")).resolves.toBeNull();

    const created = await session.run((token) =>
      provider.createPayment(token, { orderId: "ORD-000000000001", amount: 1000 }),
    );
    expect(created.paymentToken.startsWith("fake_pt_")).toBe(true);
    expect(provider.authenticateCalls).toBe(2);
  });

  it("keeps the token when an operation fails for other reasons", async () => {
    const { cache, provider, session } = createSession();

    const failure = session.run(async () => {
      throw new ProviderError("Invalid payment request.", 400, { status: 400 });
    });
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(cache.get("moncash:test-client")).resolves.not.toBeNull();
    expect(provider.authenticateCalls).toBe(1);
  });

  it("propagates authentication failures without caching", async () => {
    const { cache, provider, session } = createSession();
    provider.setUnavailable(true);

    const failure = session.accessToken();
    await expect(failure).rejects.toBeInstanceOf(AuthError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 503,
      code: "payment_unavailable",
      reason: "token endpoint unreachable: fake provider marked unavailable",
    });
    await expect(cache.get("moncash:test-client")).resolves.toBeNull();
  });
});

describe("InMemoryTokenCache", () => {
  it("evicts entries once their ttl has elapsed", async () => {
    const clock = new ManualClock();
    const cache = new InMemoryTokenCache(clock);
    await cache.set("moncash:test-client", { value: "at_test", expiresAt: "2026-03-15T12:00:30.000Z" }, 30_000);

    clock.advanceSeconds(29);
    await expect(cache.get("moncash:test-client")).resolves.toEqual({
      value: "at_test",
      expiresAt: "2026-03-15T12:00:30.000Z",
    });
    clock.advanceSeconds(1);
    await expect(cache.get("moncash:test-client")).resolves.toBeNull();
  });

  it("ignores tokens that are already expired", async () => {
    const cache = new InMemoryTokenCache(new ManualClock());
    await cache.set("moncash:test-client", { value: "at_test", expiresAt: "2026-03-15T12:00:00.000Z" }, 0);

    await expect(cache.get("moncash:test-client")).resolves.toBeNull();
  });
});
