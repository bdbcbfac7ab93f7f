import type { CreateOrderInput, PaymentTransactionStatus, ReconcileInput } from "../domain/types.js";
import { isMonth } from "../domain/stats.js";
import { AppError } from "../infra/app-error.js";

export function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

const transactionStatuses: PaymentTransactionStatus[] = ["initiated", "pending", "success", "failed"];

const MAX_ORDER_AMOUNT = 100_000_000_000;

export function assertCreateOrderInput(payload: unknown): asserts payload is CreateOrderInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }

  const { amount, currency } = payload;
  if (typeof amount !== "number" || !Number.isInteger(amount) || amount <= 0 || amount > MAX_ORDER_AMOUNT) {
    throw new AppError(422, "invalid_amount", "Amount must be an integer number of minor units greater than zero.");
  }
  if (currency !== undefined && (!isString(currency) || !/^[A-Za-z]{3}$/.test(currency))) {
    throw new AppError(422, "invalid_currency", "Currency must be a 3-letter ISO code.");
  }
}

export function parseStatusCheckInput(payload: unknown): ReconcileInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  const transactionId = normalizeResourceId(payload.transaction_id, "transaction_id");
  const orderId = normalizeResourceId(payload.order_id, "order_id");
  if (!transactionId && !orderId) {
    throw new AppError(422, "missing_lookup", "transaction_id or order_id is required.");
  }
  return {
    ...(transactionId ? { transactionId } : {}),
    ...(orderId ? { orderId } : {}),
  };
}

export function parsePollLimit(payload: unknown, fallback: number, max: number): number {
  if (payload === undefined || payload === null) {
    return fallback;
  }
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  const { limit } = payload;
  if (limit === undefined) {
    return fallback;
  }
  if (typeof limit !== "number" || !Number.isInteger(limit) || limit <= 0) {
    throw new AppError(422, "invalid_limit", "limit must be a positive integer.");
  }
  return Math.min(limit, max);
}

/** Merges query and body parameters of a provider notification; body values win. */
export function notificationPayload(query: unknown, body: unknown): Record<string, unknown> {
  return {
    ...(isObject(query) ? query : {}),
    ...(isObject(body) ? body : {}),
  };
}

export function normalizeLimit(value: unknown, fallback = 50, max = 500): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new AppError(422, "invalid_limit", "limit must be a positive integer.");
  }
  return Math.min(parsed, max);
}

export function normalizeCursor(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_cursor", "cursor must be a string.");
  }

  const cursor = value.trim();
  if (cursor.length === 0 || cursor.length > 128) {
    throw new AppError(422, "invalid_cursor", "cursor length must be between 1 and 128 characters.");
  }
  if (!/^[A-Za-z0-9_-]+$/.test(cursor)) {
    throw new AppError(422, "invalid_cursor", "cursor format is invalid.");
  }
  return cursor;
}

export function normalizeTransactionStatus(value: unknown): PaymentTransactionStatus | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_transaction_status", "status must be a string.");
  }

  const status = transactionStatuses.find((candidate) => candidate === value.trim());
  if (!status) {
    throw new AppError(422, "invalid_transaction_status", "Unsupported transaction status.");
  }
  return status;
}

export function normalizeMonth(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || !isMonth(value.trim())) {
    throw new AppError(422, "invalid_month", "month must use the YYYY-MM format.");
  }
  return value.trim();
}

export function normalizeIsoDateTime(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }
  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 64) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 64 characters.`,
    );
  }
  const timestamp = Date.parse(normalized);
  if (!Number.isFinite(timestamp)) {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a valid ISO-8601 date-time.`);
  }
  return new Date(timestamp).toISOString();
}

export function normalizeResourceId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}
