import type {
  OrderRecord,
  PaymentNotificationRecord,
  PaymentStatusHistoryRecord,
  PaymentTransactionRecord,
  PaymentTransactionStatus,
  TransactionAggregate,
} from "../../domain/types.js";
import type {
  PaymentRepositoryPort,
  PaymentTransactionListInput,
  PaymentTransactionListResult,
  TransactionStatusUpdate,
} from "../../ports/payment-repository.js";
import { AppError } from "../../infra/app-error.js";

function isWithinCreatedRange(createdAt: string, createdFrom?: string, createdTo?: string): boolean {
  const createdAtMs = Date.parse(createdAt);
  if (createdFrom) {
    const createdFromMs = Date.parse(createdFrom);
    if (Number.isFinite(createdFromMs) && createdAtMs < createdFromMs) {
      return false;
    }
  }
  if (createdTo) {
    const createdToMs = Date.parse(createdTo);
    if (Number.isFinite(createdToMs) && createdAtMs > createdToMs) {
      return false;
    }
  }
  return true;
}

export class InMemoryPaymentRepository implements PaymentRepositoryPort {
  private readonly orders = new Map<string, OrderRecord>();
  private readonly transactions = new Map<string, PaymentTransactionRecord>();
  private readonly history: PaymentStatusHistoryRecord[] = [];
  private readonly notifications = new Map<string, PaymentNotificationRecord>();
  private readonly polledAt = new Map<string, string>();

  async saveOrder(order: OrderRecord): Promise<void> {
    this.orders.set(order.id, { ...order });
  }

  async getOrderById(id: string): Promise<OrderRecord | null> {
    const order = this.orders.get(id);
    return order ? { ...order } : null;
  }

  async markOrderPaid(orderId: string, updatedAt: string): Promise<boolean> {
    const order = this.orders.get(orderId);
    if (!order || order.status !== "pending") {
      return false;
    }
    this.orders.set(orderId, { ...order, status: "paid", updated_at: updatedAt });
    return true;
  }

  async createTransaction(transaction: PaymentTransactionRecord): Promise<void> {
    for (const existing of this.transactions.values()) {
      if (existing.reference === transaction.reference) {
        throw new AppError(409, "duplicate_reference", `Reference '${transaction.reference}' is already in use.`);
      }
    }
    this.transactions.set(transaction.id, { ...transaction });
  }

  async getTransactionById(id: string): Promise<PaymentTransactionRecord | null> {
    const transaction = this.transactions.get(id);
    return transaction ? { ...transaction } : null;
  }

  async findTransactionByReference(reference: string): Promise<PaymentTransactionRecord | null> {
    return this.findFirst((transaction) => transaction.reference === reference);
  }

  async findTransactionByProviderTransactionId(providerTransactionId: string): Promise<PaymentTransactionRecord | null> {
    return this.findFirst((transaction) => transaction.provider_transaction_id === providerTransactionId);
  }

  async findLatestTransactionForOrder(orderId: string): Promise<PaymentTransactionRecord | null> {
    const latest = this.newestFirst().find((transaction) => transaction.order_id === orderId);
    return latest ? { ...latest } : null;
  }

  async listTransactionsForOrder(orderId: string): Promise<PaymentTransactionRecord[]> {
    return this.newestFirst()
      .filter((transaction) => transaction.order_id === orderId)
      .map((transaction) => ({ ...transaction }));
  }

  async listTransactions(input: PaymentTransactionListInput): Promise<PaymentTransactionListResult> {
    const items = this.newestFirst().filter((transaction) => {
      if (input.status && transaction.status !== input.status) {
        return false;
      }
      if (input.orderId && transaction.order_id !== input.orderId) {
        return false;
      }
      return isWithinCreatedRange(transaction.created_at, input.createdFrom, input.createdTo);
    });
    return this.paginate(items, input);
  }

  async listOpenTransactions(limit: number): Promise<PaymentTransactionRecord[]> {
    return [...this.transactions.values()]
      .filter((transaction) => transaction.status === "initiated" || transaction.status === "pending")
      .sort((a, b) => {
        const polledA = this.polledAt.get(a.id) ?? "";
        const polledB = this.polledAt.get(b.id) ?? "";
        return polledA.localeCompare(polledB) || a.created_at.localeCompare(b.created_at);
      })
      .slice(0, Math.max(1, limit))
      .map((transaction) => ({ ...transaction }));
  }

  async markPolled(transactionIds: string[], polledAt: string): Promise<void> {
    for (const id of transactionIds) {
      if (this.transactions.has(id)) {
        this.polledAt.set(id, polledAt);
      }
    }
  }

  async transitionTransaction(
    id: string,
    fromStatuses: PaymentTransactionStatus[],
    update: TransactionStatusUpdate,
  ): Promise<PaymentTransactionRecord | null> {
    const current = this.transactions.get(id);
    if (!current || !fromStatuses.includes(current.status)) {
      return null;
    }
    if (update.status === "success") {
      for (const other of this.transactions.values()) {
        if (other.id !== id && other.order_id === current.order_id && other.status === "success") {
          return null;
        }
      }
    }

    const next: PaymentTransactionRecord = {
      ...current,
      status: update.status,
      updated_at: update.updatedAt,
      ...(update.providerTransactionId !== undefined ? { provider_transaction_id: update.providerTransactionId } : {}),
      ...(update.payer !== undefined ? { payer: update.payer } : {}),
      ...(update.failureReason !== undefined ? { failure_reason: update.failureReason } : {}),
      ...(update.completedAt !== undefined ? { completed_at: update.completedAt } : {}),
    };
    this.transactions.set(id, next);
    return { ...next };
  }

  async appendStatusHistory(entry: PaymentStatusHistoryRecord): Promise<void> {
    this.history.push({ ...entry });
  }

  async listStatusHistory(transactionId: string): Promise<PaymentStatusHistoryRecord[]> {
    return this.history.filter((entry) => entry.transaction_id === transactionId).map((entry) => ({ ...entry }));
  }

  async saveNotification(notification: PaymentNotificationRecord): Promise<void> {
    this.notifications.set(notification.id, { ...notification });
  }

  async listNotifications(transactionId: string): Promise<PaymentNotificationRecord[]> {
    return [...this.notifications.values()]
      .filter((notification) => notification.transaction_id === transactionId)
      .map((notification) => ({ ...notification }));
  }

  async aggregateTransactions(from: string, to: string): Promise<TransactionAggregate> {
    const fromMs = Date.parse(from);
    const toMs = Date.parse(to);
    const aggregate: TransactionAggregate = { success_count: 0, pending_count: 0, failed_count: 0, total_amount: 0 };

    for (const transaction of this.transactions.values()) {
      const createdAtMs = Date.parse(transaction.created_at);
      if (createdAtMs < fromMs || createdAtMs >= toMs) {
        continue;
      }
      switch (transaction.status) {
        case "success":
          aggregate.success_count += 1;
          aggregate.total_amount += transaction.amount;
          break;
        case "failed":
          aggregate.failed_count += 1;
          break;
        default:
          aggregate.pending_count += 1;
      }
    }
    return aggregate;
  }

  private findFirst(predicate: (transaction: PaymentTransactionRecord) => boolean): PaymentTransactionRecord | null {
    for (const transaction of this.transactions.values()) {
      if (predicate(transaction)) {
        return { ...transaction };
      }
    }
    return null;
  }

  private newestFirst(): PaymentTransactionRecord[] {
    return [...this.transactions.values()].reverse().sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  private paginate(items: PaymentTransactionRecord[], input: PaymentTransactionListInput): PaymentTransactionListResult {
    const limit = Math.max(1, input.limit);
    let startIndex = 0;

    if (input.cursor) {
      const cursorIndex = items.findIndex((item) => item.id === input.cursor);
      if (cursorIndex < 0) {
        throw new AppError(422, "invalid_cursor", "cursor not found for current collection.");
      }
      startIndex = cursorIndex + 1;
    }

    const page = items.slice(startIndex, startIndex + limit).map((item) => ({ ...item }));
    const hasMore = startIndex + page.length < items.length;
    const lastItem = page.at(-1);
    const nextCursor = hasMore && lastItem ? lastItem.id : undefined;

    return {
      data: page,
      hasMore,
      ...(nextCursor ? { nextCursor } : {}),
    };
  }
}
