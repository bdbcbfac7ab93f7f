import type {
  OrderRecord,
  OrderResponse,
  PaymentTransactionRecord,
  PaymentTransactionResponse,
} from "../domain/types.js";

export function isTransactionExpired(transaction: PaymentTransactionRecord, nowIso: string): boolean {
  if (transaction.status !== "initiated" && transaction.status !== "pending") {
    return false;
  }
  return Date.parse(nowIso) >= Date.parse(transaction.expires_at);
}

export function mapOrder(order: OrderRecord): OrderResponse {
  return {
    id: order.id,
    amount: order.amount,
    currency: order.currency,
    status: order.status,
    created_at: order.created_at,
    updated_at: order.updated_at,
  };
}

/** The payment token is only exposed as a redirect URL, and only while the customer can still pay. */
export function mapPaymentTransaction(
  transaction: PaymentTransactionRecord,
  nowIso: string,
  redirectUrl: (paymentToken: string) => string,
): PaymentTransactionResponse {
  const expired = isTransactionExpired(transaction, nowIso);
  const payable = !expired && (transaction.status === "initiated" || transaction.status === "pending");
  return {
    id: transaction.id,
    order_id: transaction.order_id,
    reference: transaction.reference,
    provider: transaction.provider,
    provider_transaction_id: transaction.provider_transaction_id,
    amount: transaction.amount,
    currency: transaction.currency,
    status: transaction.status,
    payer: transaction.payer,
    failure_reason: transaction.failure_reason,
    redirect_url: payable ? redirectUrl(transaction.payment_token) : null,
    is_expired: expired,
    expires_at: transaction.expires_at,
    completed_at: transaction.completed_at,
    created_at: transaction.created_at,
    updated_at: transaction.updated_at,
  };
}
