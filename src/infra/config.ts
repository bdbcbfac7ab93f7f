import { AppError } from "./app-error.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

function parseUrlEnv(name: string, defaultValue: string): string {
  const value = parseStringEnv(name, defaultValue, 8);
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw invalidConfig(name, "must be an absolute URL");
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw invalidConfig(name, "must use http or https");
  }
  return value.replace(/\/+$/, "");
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type MonCashMode = "sandbox" | "live";

const MONCASH_HOSTS: Record<MonCashMode, { api: string; gateway: string }> = {
  sandbox: {
    api: "https://sandbox.moncashbutton.digicelgroup.com/Api",
    gateway: "https://sandbox.moncashbutton.digicelgroup.com/Moncash-middleware",
  },
  live: {
    api: "https://moncashbutton.digicelgroup.com/Api",
    gateway: "https://moncashbutton.digicelgroup.com/Moncash-middleware",
  },
};

export interface MonCashConfig {
  mode: MonCashMode;
  clientId?: string;
  clientSecret?: string;
  apiBaseUrl: string;
  gatewayBaseUrl: string;
  timeoutMs: number;
  tokenSkewSeconds: number;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKeys: string[];
  logLevel: LogLevel;
  metricsEnabled: boolean;
  storageBackend: "memory" | "postgres";
  tokenCacheBackend: "memory" | "redis";
  providerBackend: "fake" | "moncash";
  databaseUrl?: string;
  redisUrl?: string;
  redisTokenCachePrefix: string;
  defaultCurrency: string;
  paymentExpiryMinutes: number;
  listDefaultLimit: number;
  listMaxLimit: number;
  pollBatchSize: number;
  moncash: MonCashConfig;
}

const DEFAULT_API_KEY = "dev_payments_key";

export function loadRuntimeConfig(): Readonly<RuntimeConfig> {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("PAYMENTS_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("PAYMENTS_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const logLevel = parseEnumEnv("LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("METRICS_ENABLED", true);
  const storageBackend = parseEnumEnv(
    "PAYMENTS_STORAGE_BACKEND",
    ["memory", "postgres"] as const,
    "memory",
  );
  const tokenCacheBackend = parseEnumEnv(
    "PAYMENTS_TOKEN_CACHE_BACKEND",
    ["memory", "redis"] as const,
    "memory",
  );
  const providerBackend = parseEnumEnv(
    "PAYMENTS_PROVIDER_BACKEND",
    ["fake", "moncash"] as const,
    "fake",
  );
  const databaseUrl = parseOptionalStringEnv("DATABASE_URL", 12);
  const redisUrl = parseOptionalStringEnv("REDIS_URL", 8);
  const redisTokenCachePrefix = parseStringEnv("REDIS_TOKEN_CACHE_PREFIX", "payments:moncash-token", 3);
  const defaultCurrency = parseStringEnv("PAYMENTS_DEFAULT_CURRENCY", "HTG", 3).toUpperCase();
  const paymentExpiryMinutes = parseIntegerEnv("PAYMENTS_EXPIRY_MINUTES", 10, 1, 1440);
  const listDefaultLimit = parseIntegerEnv("PAYMENTS_LIST_DEFAULT_LIMIT", 50, 1, 1000);
  const listMaxLimit = parseIntegerEnv("PAYMENTS_LIST_MAX_LIMIT", 500, 1, 5000);
  const pollBatchSize = parseIntegerEnv("PAYMENTS_POLL_BATCH_SIZE", 100, 1, 1000);

  const mode = parseEnumEnv("MONCASH_MODE", ["sandbox", "live"] as const, "sandbox");
  const clientId = parseOptionalStringEnv("MONCASH_CLIENT_ID", 4);
  const clientSecret = parseOptionalStringEnv("MONCASH_CLIENT_SECRET", 8);
  const apiBaseUrl = parseUrlEnv("MONCASH_API_BASE_URL", MONCASH_HOSTS[mode].api);
  const gatewayBaseUrl = parseUrlEnv("MONCASH_GATEWAY_BASE_URL", MONCASH_HOSTS[mode].gateway);
  const timeoutMs = parseIntegerEnv("MONCASH_TIMEOUT_MS", 10000, 100, 120000);
  const tokenSkewSeconds = parseIntegerEnv("MONCASH_TOKEN_SKEW_SECONDS", 5, 0, 300);

  if (!/^[A-Z]{3}$/.test(defaultCurrency)) {
    throw invalidConfig("PAYMENTS_DEFAULT_CURRENCY", "must be a 3-letter ISO code");
  }
  if (process.env.NODE_ENV === "production" && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      configuredApiKeys ? "PAYMENTS_API_KEYS" : "PAYMENTS_API_KEY",
      "must not include default key value in production",
    );
  }
  if (process.env.NODE_ENV === "production" && providerBackend === "fake") {
    throw invalidConfig("PAYMENTS_PROVIDER_BACKEND", "must be 'moncash' in production");
  }
  if (listDefaultLimit > listMaxLimit) {
    throw invalidConfig("PAYMENTS_LIST_DEFAULT_LIMIT", "must be lower or equal to PAYMENTS_LIST_MAX_LIMIT");
  }
  if (storageBackend === "postgres" && !databaseUrl) {
    throw invalidConfig("DATABASE_URL", "is required when the postgres storage backend is enabled");
  }
  if (tokenCacheBackend === "redis" && !redisUrl) {
    throw invalidConfig("REDIS_URL", "is required when the redis token cache is enabled");
  }
  if (providerBackend === "moncash" && (!clientId || !clientSecret)) {
    throw invalidConfig(
      clientId ? "MONCASH_CLIENT_SECRET" : "MONCASH_CLIENT_ID",
      "is required when the moncash provider backend is enabled",
    );
  }

  return Object.freeze({
    host,
    port,
    apiKeys,
    logLevel,
    metricsEnabled,
    storageBackend,
    tokenCacheBackend,
    providerBackend,
    redisTokenCachePrefix,
    defaultCurrency,
    paymentExpiryMinutes,
    listDefaultLimit,
    listMaxLimit,
    pollBatchSize,
    moncash: Object.freeze({
      mode,
      apiBaseUrl,
      gatewayBaseUrl,
      timeoutMs,
      tokenSkewSeconds,
      ...(clientId ? { clientId } : {}),
      ...(clientSecret ? { clientSecret } : {}),
    }),
    ...(databaseUrl ? { databaseUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
  });
}
