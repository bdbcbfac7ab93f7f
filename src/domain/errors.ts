import { AppError } from "../infra/app-error.js";
import type { OrderStatus } from "./types.js";

/**
 * Provider authentication failed, or the provider rejected a bearer token.
 * The reason stays in the logs; callers only see a generic message.
 */
export class AuthError extends AppError {
  constructor(
    public readonly reason: string,
    public readonly tokenRejected = false,
  ) {
    super(503, "payment_unavailable", "Payment is temporarily unavailable.");
  }
}

/** The provider refused a request (invalid amount, duplicate order id, ...). */
export class ProviderError extends AppError {
  constructor(
    message: string,
    public readonly providerStatus: number,
    public readonly providerPayload: Record<string, unknown>,
    statusCode = 422,
    code = "payment_could_not_be_initiated",
  ) {
    super(statusCode, code, message, { provider_status: providerStatus, provider_response: providerPayload });
  }
}

export class ProviderPaymentNotFoundError extends ProviderError {
  constructor(lookup: string, providerPayload: Record<string, unknown>) {
    super(`Provider has no payment for '${lookup}'.`, 404, providerPayload, 404, "provider_payment_not_found");
  }
}

/** Network failure, timeout or provider 5xx. Safe to retry explicitly. */
export class ProviderUnavailableError extends AppError {
  public readonly retryable = true;

  constructor(operation: string, reason: string) {
    super(503, "provider_unavailable", `Payment provider is unavailable (${operation}): ${reason}`);
  }
}

export class InvalidOrderStateError extends AppError {
  constructor(orderId: string, status: OrderStatus) {
    super(409, "invalid_order_state", `Order '${orderId}' is '${status}' and cannot be paid.`);
  }
}

export class TransactionNotFoundError extends AppError {
  constructor(lookup: { transactionId?: string; orderId?: string }) {
    const parts = [
      lookup.transactionId ? `transaction '${lookup.transactionId}'` : null,
      lookup.orderId ? `order '${lookup.orderId}'` : null,
    ].filter((part): part is string => part !== null);
    super(404, "transaction_not_found", `No local payment transaction matches ${parts.join(" or ")}.`);
  }
}
