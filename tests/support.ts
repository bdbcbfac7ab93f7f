import { InMemoryPaymentRepository } from "../src/adapters/inmemory/payment-repository.js";
import { InMemoryTokenCache } from "../src/adapters/inmemory/token-cache.js";
import { FakeMonCashProvider } from "../src/adapters/providers/fake-moncash-provider.js";
import { OrderService } from "../src/application/order-service.js";
import { PaymentReconciler } from "../src/application/payment-reconciler.js";
import { ProviderSession } from "../src/application/provider-session.js";
import type { OrderRecord } from "../src/domain/types.js";
import { addSecondsIso, type ClockPort } from "../src/infra/clock.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import { createNoopLogger } from "../src/infra/logger.js";
import { PaymentMetricsRegistry } from "../src/infra/metrics.js";

export const TEST_API_KEY = "test_api_key_0001";
export const GATEWAY_BASE_URL = "https://moncash.test/Moncash-middleware";
export const START_TIME = "2026-03-15T12:00:00.000Z";

export class ManualClock implements ClockPort {
  constructor(private current: string = START_TIME) {}

  nowIso(): string {
    return this.current;
  }

  advanceSeconds(seconds: number): void {
    this.current = addSecondsIso(this.current, seconds);
  }
}

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    apiKeys: [TEST_API_KEY],
    logLevel: "silent",
    metricsEnabled: true,
    storageBackend: "memory",
    tokenCacheBackend: "memory",
    providerBackend: "fake",
    redisTokenCachePrefix: "test:moncash-token",
    defaultCurrency: "HTG",
    paymentExpiryMinutes: 10,
    listDefaultLimit: 50,
    listMaxLimit: 500,
    pollBatchSize: 100,
    moncash: {
      mode: "sandbox",
      apiBaseUrl: "https://moncash.test/Api",
      gatewayBaseUrl: GATEWAY_BASE_URL,
      timeoutMs: 1000,
      tokenSkewSeconds: 5,
    },
    ...overrides,
  };
}

/** Reconciler wired to in-memory adapters, with predictable references `ORD-000000000001`, `ORD-000000000002`, ... */
export function createReconcilerHarness() {
  const clock = new ManualClock();
  const logger = createNoopLogger();
  const repository = new InMemoryPaymentRepository();
  const provider = new FakeMonCashProvider({ clock, gatewayBaseUrl: GATEWAY_BASE_URL });
  const session = new ProviderSession(
    provider,
    { clientId: "test-client", clientSecret: "test-secret" },
    new InMemoryTokenCache(clock),
    { clock, logger, skewSeconds: 5 },
  );
  let sequence = 0;
  const reconciler = new PaymentReconciler(
    repository,
    provider,
    session,
    clock,
    logger,
    new PaymentMetricsRegistry(),
    {
      expiryMinutes: 10,
      referenceFactory: () => {
        sequence += 1;
        return `ORD-${String(sequence).padStart(12, "0")}`;
      },
    },
  );
  const orders = new OrderService(repository, provider, clock, "HTG");
  let orderSequence = 0;

  async function seedOrder(overrides: Partial<OrderRecord> = {}): Promise<OrderRecord> {
    orderSequence += 1;
    const order: OrderRecord = {
      id: `ord_test_${orderSequence}`,
      amount: 1000,
      currency: "HTG",
      status: "pending",
      created_at: clock.nowIso(),
      updated_at: clock.nowIso(),
      ...overrides,
    };
    await repository.saveOrder(order);
    return order;
  }

  return { clock, repository, provider, session, reconciler, orders, seedOrder };
}
