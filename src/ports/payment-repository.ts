import type {
  OrderRecord,
  PaymentNotificationRecord,
  PaymentStatusHistoryRecord,
  PaymentTransactionRecord,
  PaymentTransactionStatus,
  TransactionAggregate,
} from "../domain/types.js";

export interface PaymentTransactionListInput {
  limit: number;
  cursor?: string;
  status?: PaymentTransactionStatus;
  orderId?: string;
  createdFrom?: string;
  createdTo?: string;
}

export interface PaymentTransactionListResult {
  data: PaymentTransactionRecord[];
  hasMore: boolean;
  nextCursor?: string;
}

export interface TransactionStatusUpdate {
  status: PaymentTransactionStatus;
  updatedAt: string;
  providerTransactionId?: string;
  payer?: string;
  failureReason?: string;
  completedAt?: string;
}

export interface PaymentRepositoryPort {
  saveOrder(order: OrderRecord): Promise<void>;
  getOrderById(id: string): Promise<OrderRecord | null>;
  /** Moves an order from `pending` to `paid`. Returns false when it was not pending. */
  markOrderPaid(orderId: string, updatedAt: string): Promise<boolean>;

  createTransaction(transaction: PaymentTransactionRecord): Promise<void>;
  getTransactionById(id: string): Promise<PaymentTransactionRecord | null>;
  findTransactionByReference(reference: string): Promise<PaymentTransactionRecord | null>;
  findTransactionByProviderTransactionId(providerTransactionId: string): Promise<PaymentTransactionRecord | null>;
  findLatestTransactionForOrder(orderId: string): Promise<PaymentTransactionRecord | null>;
  listTransactionsForOrder(orderId: string): Promise<PaymentTransactionRecord[]>;
  listTransactions(input: PaymentTransactionListInput): Promise<PaymentTransactionListResult>;
  /** Never-polled rows first, then least recently polled, then oldest. */
  listOpenTransactions(limit: number): Promise<PaymentTransactionRecord[]>;
  markPolled(transactionIds: string[], polledAt: string): Promise<void>;
  /**
   * Applies the update only while the row is in one of `fromStatuses`. A move to `success` also
   * requires that no other transaction of the same order already succeeded. Returns the updated
   * row, or null when the condition did not hold.
   */
  transitionTransaction(
    id: string,
    fromStatuses: PaymentTransactionStatus[],
    update: TransactionStatusUpdate,
  ): Promise<PaymentTransactionRecord | null>;

  appendStatusHistory(entry: PaymentStatusHistoryRecord): Promise<void>;
  listStatusHistory(transactionId: string): Promise<PaymentStatusHistoryRecord[]>;

  saveNotification(notification: PaymentNotificationRecord): Promise<void>;
  listNotifications(transactionId: string): Promise<PaymentNotificationRecord[]>;

  /** Aggregates transactions created in `[from, to)`. */
  aggregateTransactions(from: string, to: string): Promise<TransactionAggregate>;
}
