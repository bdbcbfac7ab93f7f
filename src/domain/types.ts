export type OrderStatus = "pending" | "paid" | "failed" | "cancelled";

export type PaymentTransactionStatus = "initiated" | "pending" | "success" | "failed";

export type ProviderPaymentStatus = "success" | "pending" | "failed";

export type ReconcileSource = "callback" | "return" | "status_check" | "poll";

export type ReconcileOutcome =
  | "succeeded"
  | "already_succeeded"
  | "failed"
  | "already_failed"
  | "pending"
  | "mismatch"
  | "conflict";

export interface OrderRecord {
  id: string;
  amount: number;
  currency: string;
  status: OrderStatus;
  created_at: string;
  updated_at: string;
}

export interface PaymentTransactionRecord {
  id: string;
  order_id: string;
  reference: string;
  provider: string;
  provider_transaction_id: string | null;
  payment_token: string;
  amount: number;
  currency: string;
  status: PaymentTransactionStatus;
  payer: string | null;
  failure_reason: string | null;
  expires_at: string;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface PaymentStatusHistoryRecord {
  id: string;
  transaction_id: string;
  old_status: PaymentTransactionStatus | null;
  new_status: PaymentTransactionStatus;
  reason: string;
  changed_by: ReconcileSource | "initiate";
  changed_at: string;
}

export type NotificationOutcome = ReconcileOutcome | "not_found" | "deferred";

export interface PaymentNotificationRecord {
  id: string;
  transaction_id: string | null;
  source: "callback" | "return";
  raw_data: Record<string, unknown>;
  processed: boolean;
  outcome: NotificationOutcome | null;
  processing_error: string | null;
  received_at: string;
  processed_at: string | null;
}

export interface TransactionAggregate {
  success_count: number;
  pending_count: number;
  failed_count: number;
  total_amount: number;
}

export interface MonthlyStats extends TransactionAggregate {
  month: string;
}

export interface OrderResponse {
  id: string;
  amount: number;
  currency: string;
  status: OrderStatus;
  created_at: string;
  updated_at: string;
}

export interface PaymentTransactionResponse {
  id: string;
  order_id: string;
  reference: string;
  provider: string;
  provider_transaction_id: string | null;
  amount: number;
  currency: string;
  status: PaymentTransactionStatus;
  payer: string | null;
  failure_reason: string | null;
  redirect_url: string | null;
  is_expired: boolean;
  expires_at: string;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateOrderInput {
  amount: number;
  currency?: string;
}

export interface ReconcileInput {
  transactionId?: string;
  orderId?: string;
  reportedStatus?: string;
}
