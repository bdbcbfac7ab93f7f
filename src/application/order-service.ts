import { randomUUID } from "node:crypto";
import type {
  CreateOrderInput,
  OrderRecord,
  OrderResponse,
  PaymentNotificationRecord,
  PaymentStatusHistoryRecord,
  PaymentTransactionRecord,
  PaymentTransactionResponse,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { PaymentProviderPort } from "../ports/payment-provider.js";
import type { PaymentRepositoryPort, PaymentTransactionListInput } from "../ports/payment-repository.js";
import { mapOrder, mapPaymentTransaction } from "./payment-mapper.js";

export interface OrderDetails {
  order: OrderResponse;
  transactions: PaymentTransactionResponse[];
}

export interface PaymentTransactionDetails {
  transaction: PaymentTransactionResponse;
  status_history: PaymentStatusHistoryRecord[];
  notifications: PaymentNotificationRecord[];
}

export class OrderService {
  constructor(
    private readonly repository: PaymentRepositoryPort,
    private readonly provider: PaymentProviderPort,
    private readonly clock: ClockPort,
    private readonly defaultCurrency: string,
  ) {}

  async createOrder(input: CreateOrderInput): Promise<OrderResponse> {
    const timestamp = this.clock.nowIso();
    const order: OrderRecord = {
      id: `ord_${randomUUID()}`,
      amount: input.amount,
      currency: (input.currency ?? this.defaultCurrency).toUpperCase(),
      status: "pending",
      created_at: timestamp,
      updated_at: timestamp,
    };
    await this.repository.saveOrder(order);
    return mapOrder(order);
  }

  async getOrder(id: string): Promise<OrderDetails> {
    const order = await this.repository.getOrderById(id);
    if (!order) {
      throw new AppError(404, "resource_not_found", `Order '${id}' not found.`);
    }
    const transactions = await this.repository.listTransactionsForOrder(id);
    const nowIso = this.clock.nowIso();
    return {
      order: mapOrder(order),
      transactions: transactions.map((transaction) => this.mapTransaction(transaction, nowIso)),
    };
  }

  async getTransaction(id: string): Promise<PaymentTransactionDetails> {
    const transaction = await this.repository.getTransactionById(id);
    if (!transaction) {
      throw new AppError(404, "resource_not_found", `Payment transaction '${id}' not found.`);
    }
    const [statusHistory, notifications] = await Promise.all([
      this.repository.listStatusHistory(id),
      this.repository.listNotifications(id),
    ]);
    return {
      transaction: this.mapTransaction(transaction, this.clock.nowIso()),
      status_history: statusHistory,
      notifications,
    };
  }

  async listTransactions(input: PaymentTransactionListInput): Promise<{
    data: PaymentTransactionResponse[];
    hasMore: boolean;
    nextCursor?: string;
  }> {
    const page = await this.repository.listTransactions(input);
    const nowIso = this.clock.nowIso();
    return {
      data: page.data.map((transaction) => this.mapTransaction(transaction, nowIso)),
      hasMore: page.hasMore,
      ...(page.nextCursor ? { nextCursor: page.nextCursor } : {}),
    };
  }

  private mapTransaction(transaction: PaymentTransactionRecord, nowIso: string): PaymentTransactionResponse {
    return mapPaymentTransaction(transaction, nowIso, (token) => this.provider.redirectUrl(token));
  }
}
