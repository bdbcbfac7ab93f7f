import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import { Redis } from "ioredis";
import { Pool } from "pg";
import { DashboardService } from "./application/dashboard-service.js";
import { OrderService } from "./application/order-service.js";
import { PaymentReconciler } from "./application/payment-reconciler.js";
import { ProviderSession } from "./application/provider-session.js";
import { InMemoryPaymentRepository } from "./adapters/inmemory/payment-repository.js";
import { InMemoryTokenCache } from "./adapters/inmemory/token-cache.js";
import { PostgresPaymentRepository } from "./adapters/postgres/payment-repository.js";
import { FakeMonCashProvider } from "./adapters/providers/fake-moncash-provider.js";
import { MonCashClient } from "./adapters/providers/moncash-client.js";
import { RedisTokenCache } from "./adapters/redis/token-cache.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { createLogger, type Logger } from "./infra/logger.js";
import { PaymentMetricsRegistry } from "./infra/metrics.js";
import type { PaymentProviderPort } from "./ports/payment-provider.js";
import type { PaymentRepositoryPort } from "./ports/payment-repository.js";
import type { TokenCachePort } from "./ports/token-cache.js";
import {
  assertCreateOrderInput,
  normalizeCursor,
  normalizeIsoDateTime,
  normalizeLimit,
  normalizeMonth,
  normalizeResourceId,
  normalizeTransactionStatus,
  notificationPayload,
  parsePollLimit,
  parseStatusCheckInput,
} from "./api/validators.js";

/** Collaborators a caller (usually a test) can swap for in-process stand-ins. */
export interface AppOverrides {
  repository?: PaymentRepositoryPort;
  provider?: PaymentProviderPort;
  tokenCache?: TokenCachePort;
  clock?: ClockPort;
  logger?: Logger;
}

interface IdParams {
  id: string;
}

interface TransactionListQuery {
  limit?: string;
  cursor?: string;
  status?: string;
  order_id?: string;
  created_from?: string;
  created_to?: string;
}

const PROVIDER_ROUTES = new Set(["/v1/moncash/callback", "/v1/moncash/return"]);

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function requirePathId(params: IdParams, resource: string): string {
  const id = params.id.trim();
  if (!id) {
    throw new AppError(400, "invalid_path_parameter", `${resource} id is required.`);
  }
  return id;
}

export function buildApp(config: RuntimeConfig = loadRuntimeConfig(), overrides: AppOverrides = {}): FastifyInstance {
  const logger = overrides.logger ?? createLogger(config);
  const fastifyLogger: FastifyBaseLogger = logger;
  const app = Fastify({ loggerInstance: fastifyLogger });
  const metrics = new PaymentMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys);
  const closeActions: Array<() => Promise<void>> = [];
  const clock = overrides.clock ?? new SystemClock();

  let repository: PaymentRepositoryPort;
  if (overrides.repository) {
    repository = overrides.repository;
  } else if (config.storageBackend === "postgres") {
    if (!config.databaseUrl) {
      throw new AppError(500, "invalid_runtime_config", "Postgres storage requested without DATABASE_URL.");
    }
    const pool = new Pool({ connectionString: config.databaseUrl });
    closeActions.push(async () => {
      await pool.end();
    });
    repository = new PostgresPaymentRepository(pool);
  } else {
    repository = new InMemoryPaymentRepository();
  }

  let tokenCache: TokenCachePort;
  if (overrides.tokenCache) {
    tokenCache = overrides.tokenCache;
  } else if (config.tokenCacheBackend === "redis") {
    if (!config.redisUrl) {
      throw new AppError(500, "invalid_runtime_config", "Redis token cache requested without REDIS_URL.");
    }
    const redisCache = new RedisTokenCache(
      new Redis(config.redisUrl, { lazyConnect: false, maxRetriesPerRequest: 1 }),
      { keyPrefix: config.redisTokenCachePrefix },
    );
    closeActions.push(async () => {
      await redisCache.close();
    });
    tokenCache = redisCache;
  } else {
    tokenCache = new InMemoryTokenCache(clock);
  }

  const provider =
    overrides.provider ??
    (config.providerBackend === "moncash"
      ? new MonCashClient({
        apiBaseUrl: config.moncash.apiBaseUrl,
        gatewayBaseUrl: config.moncash.gatewayBaseUrl,
        timeoutMs: config.moncash.timeoutMs,
        clock,
        logger: logger.child({ component: "moncash-client" }),
        metrics,
      })
      : new FakeMonCashProvider({ gatewayBaseUrl: config.moncash.gatewayBaseUrl, clock }));

  const session = new ProviderSession(
    provider,
    {
      clientId: config.moncash.clientId ?? "local-client",
      clientSecret: config.moncash.clientSecret ?? "local-secret",
    },
    tokenCache,
    { clock, logger, skewSeconds: config.moncash.tokenSkewSeconds },
  );
  const reconciler = new PaymentReconciler(
    repository,
    provider,
    session,
    clock,
    logger.child({ component: "reconciler" }),
    metrics,
    { expiryMinutes: config.paymentExpiryMinutes },
  );
  const orders = new OrderService(repository, provider, clock, config.defaultCurrency);
  const dashboard = new DashboardService(repository, clock);

  app.addContentTypeParser("application/x-www-form-urlencoded", { parseAs: "string" }, (_request, body, done) => {
    const text = typeof body === "string" ? body : body.toString("utf8");
    done(null, Object.fromEntries(new URLSearchParams(text)));
  });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("X-Request-Id", request.id);
    const path = request.url.split("?")[0] ?? request.url;
    if (path.startsWith("/health/") || PROVIDER_ROUTES.has(path)) {
      return;
    }
    if (config.metricsEnabled && path === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const route = request.routeOptions.url ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, reply.elapsedTime / 1000);
  });

  app.post("/v1/orders", async (request, reply) => {
    assertCreateOrderInput(request.body);
    const order = await orders.createOrder(request.body);
    return reply.status(201).send(order);
  });

  app.get<{ Params: IdParams }>("/v1/orders/:id", async (request, reply) => {
    const details = await orders.getOrder(requirePathId(request.params, "Order"));
    return reply.status(200).send(details);
  });

  app.post<{ Params: IdParams }>("/v1/orders/:id/payments", async (request, reply) => {
    const result = await reconciler.initiate(requirePathId(request.params, "Order"));
    return reply.status(201).send(result);
  });

  app.get<{ Querystring: TransactionListQuery }>("/v1/payment-transactions", async (request, reply) => {
    const query = request.query;
    const limit = normalizeLimit(query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeCursor(query.cursor);
    const status = normalizeTransactionStatus(query.status);
    const orderId = normalizeResourceId(query.order_id, "order_id");
    const createdFrom = normalizeIsoDateTime(query.created_from, "created_from");
    const createdTo = normalizeIsoDateTime(query.created_to, "created_to");
    if (createdFrom && createdTo && Date.parse(createdFrom) > Date.parse(createdTo)) {
      throw new AppError(422, "invalid_created_range", "created_from must be lower or equal to created_to.");
    }
    const page = await orders.listTransactions({
      limit,
      ...(cursor ? { cursor } : {}),
      ...(status ? { status } : {}),
      ...(orderId ? { orderId } : {}),
      ...(createdFrom ? { createdFrom } : {}),
      ...(createdTo ? { createdTo } : {}),
    });
    return reply.status(200).send({
      data: page.data,
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextCursor ?? null,
      },
    });
  });

  app.get<{ Params: IdParams }>("/v1/payment-transactions/:id", async (request, reply) => {
    const details = await orders.getTransaction(requirePathId(request.params, "Payment transaction"));
    return reply.status(200).send(details);
  });

  app.post("/v1/payment-transactions/status", async (request, reply) => {
    const result = await reconciler.checkStatus(parseStatusCheckInput(request.body));
    return reply.status(200).send(result);
  });

  app.post("/v1/moncash/callback", async (request, reply) => {
    const result = await reconciler.handleProviderNotification(
      notificationPayload(request.query, request.body),
      "callback",
    );
    return reply.status(200).send({ received: true, ...result });
  });

  app.get("/v1/moncash/return", async (request, reply) => {
    const result = await reconciler.handleProviderNotification(notificationPayload(request.query, undefined), "return");
    return reply.status(200).send({ received: true, ...result });
  });

  app.post("/v1/admin/reconciliation/poll", async (request, reply) => {
    const limit = parsePollLimit(request.body, config.pollBatchSize, config.pollBatchSize);
    const summary = await reconciler.pollPending(limit);
    return reply.status(200).send(summary);
  });

  app.get<{ Querystring: { month?: string } }>("/v1/admin/dashboard/monthly", async (request, reply) => {
    const report = await dashboard.monthlyReport(normalizeMonth(request.query.month));
    return reply.status(200).send(report);
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = await metrics.renderPrometheus();
      return reply.header("Content-Type", metrics.contentType).status(200).send(payload);
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
        request_id: request.id,
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.warn({ code: error.code }, error.message);
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (error instanceof Error && "statusCode" in error && error.statusCode === 400) {
      return reply.status(400).send({
        error: {
          code: "invalid_request_body",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
