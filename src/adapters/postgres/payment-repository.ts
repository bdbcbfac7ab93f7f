import type { Pool } from "pg";
import type {
  NotificationOutcome,
  OrderRecord,
  PaymentNotificationRecord,
  PaymentStatusHistoryRecord,
  PaymentTransactionRecord,
  PaymentTransactionStatus,
  TransactionAggregate,
} from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type {
  PaymentRepositoryPort,
  PaymentTransactionListInput,
  PaymentTransactionListResult,
  TransactionStatusUpdate,
} from "../../ports/payment-repository.js";

type CursorInput = { cursor?: string; limit: number };

type OrderRow = {
  id: string;
  amount: unknown;
  currency: string;
  status: OrderRecord["status"];
  created_at: unknown;
  updated_at: unknown;
};

type TransactionRow = {
  id: string;
  order_id: string;
  reference: string;
  provider: string;
  provider_transaction_id: string | null;
  payment_token: string;
  amount: unknown;
  currency: string;
  status: PaymentTransactionStatus;
  payer: string | null;
  failure_reason: string | null;
  expires_at: unknown;
  completed_at: unknown;
  created_at: unknown;
  updated_at: unknown;
};

type HistoryRow = {
  id: string;
  transaction_id: string;
  old_status: PaymentTransactionStatus | null;
  new_status: PaymentTransactionStatus;
  reason: string;
  changed_by: PaymentStatusHistoryRecord["changed_by"];
  changed_at: unknown;
};

type NotificationRow = {
  id: string;
  transaction_id: string | null;
  source: PaymentNotificationRecord["source"];
  raw_data: Record<string, unknown>;
  processed: boolean;
  outcome: NotificationOutcome | null;
  processing_error: string | null;
  received_at: unknown;
  processed_at: unknown;
};

const TRANSACTION_COLUMNS = `
  id,
  order_id,
  reference,
  provider,
  provider_transaction_id,
  payment_token,
  amount,
  currency,
  status,
  payer,
  failure_reason,
  expires_at,
  completed_at,
  created_at,
  updated_at
`;

function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function mapNullableTimestamp(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return mapTimestamp(value);
}

function toNumber(value: unknown, field: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(500, "persistence_mapping_error", `Unable to map numeric field '${field}'.`);
  }
  return parsed;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "23505";
}

function paginateByCursor<TItem extends { id: string }>(
  items: TItem[],
  input: CursorInput,
): { data: TItem[]; hasMore: boolean; nextCursor?: string } {
  const limit = Math.max(1, input.limit);
  let startIndex = 0;
  if (input.cursor) {
    const cursorIndex = items.findIndex((item) => item.id === input.cursor);
    if (cursorIndex < 0) {
      throw new AppError(422, "invalid_cursor", "cursor not found for current collection.");
    }
    startIndex = cursorIndex + 1;
  }

  const page = items.slice(startIndex, startIndex + limit);
  const hasMore = startIndex + page.length < items.length;
  const nextCursor = hasMore ? page.at(-1)?.id : undefined;

  return {
    data: page,
    hasMore,
    ...(nextCursor ? { nextCursor } : {}),
  };
}

function mapOrderRow(row: OrderRow): OrderRecord {
  return {
    id: row.id,
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    status: row.status,
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

function mapTransactionRow(row: TransactionRow): PaymentTransactionRecord {
  return {
    id: row.id,
    order_id: row.order_id,
    reference: row.reference,
    provider: row.provider,
    provider_transaction_id: row.provider_transaction_id,
    payment_token: row.payment_token,
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    status: row.status,
    payer: row.payer,
    failure_reason: row.failure_reason,
    expires_at: mapTimestamp(row.expires_at),
    completed_at: mapNullableTimestamp(row.completed_at),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

export class PostgresPaymentRepository implements PaymentRepositoryPort {
  constructor(private readonly pool: Pool) {}

  async saveOrder(order: OrderRecord): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO mkp_orders (id, amount, currency, status, created_at, updated_at)
        VALUES ($1, $2::bigint, $3, $4, $5::timestamptz, $6::timestamptz)
        ON CONFLICT (id) DO UPDATE
        SET amount = EXCLUDED.amount,
            currency = EXCLUDED.currency,
            status = EXCLUDED.status,
            updated_at = EXCLUDED.updated_at
      `,
      [order.id, order.amount, order.currency, order.status, order.created_at, order.updated_at],
    );
  }

  async getOrderById(id: string): Promise<OrderRecord | null> {
    const result = await this.pool.query<OrderRow>(
      `
        SELECT id, amount, currency, status, created_at, updated_at
        FROM mkp_orders
        WHERE id = $1
      `,
      [id],
    );
    const row = result.rows[0];
    return row ? mapOrderRow(row) : null;
  }

  async markOrderPaid(orderId: string, updatedAt: string): Promise<boolean> {
    const result = await this.pool.query(
      `
        UPDATE mkp_orders
        SET status = 'paid', updated_at = $2::timestamptz
        WHERE id = $1 AND status = 'pending'
      `,
      [orderId, updatedAt],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async createTransaction(transaction: PaymentTransactionRecord): Promise<void> {
    try {
      await this.pool.query(
        `
          INSERT INTO mkp_payment_transactions (${TRANSACTION_COLUMNS})
          VALUES (
            $1,
            $2,
            $3,
            $4,
            $5,
            $6,
            $7::bigint,
            $8,
            $9,
            $10,
            $11,
            $12::timestamptz,
            $13::timestamptz,
            $14::timestamptz,
            $15::timestamptz
          )
        `,
        [
          transaction.id,
          transaction.order_id,
          transaction.reference,
          transaction.provider,
          transaction.provider_transaction_id,
          transaction.payment_token,
          transaction.amount,
          transaction.currency,
          transaction.status,
          transaction.payer,
          transaction.failure_reason,
          transaction.expires_at,
          transaction.completed_at,
          transaction.created_at,
          transaction.updated_at,
        ],
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AppError(409, "duplicate_reference", `Reference '${transaction.reference}' is already in use.`);
      }
      throw error;
    }
  }

  async getTransactionById(id: string): Promise<PaymentTransactionRecord | null> {
    return this.findOneTransaction("id = $1", [id]);
  }

  async findTransactionByReference(reference: string): Promise<PaymentTransactionRecord | null> {
    return this.findOneTransaction("reference = $1", [reference]);
  }

  async findTransactionByProviderTransactionId(providerTransactionId: string): Promise<PaymentTransactionRecord | null> {
    return this.findOneTransaction("provider_transaction_id = $1", [providerTransactionId]);
  }

  async findLatestTransactionForOrder(orderId: string): Promise<PaymentTransactionRecord | null> {
    return this.findOneTransaction("order_id = $1", [orderId]);
  }

  async listTransactionsForOrder(orderId: string): Promise<PaymentTransactionRecord[]> {
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${TRANSACTION_COLUMNS}
        FROM mkp_payment_transactions
        WHERE order_id = $1
        ORDER BY created_at DESC, id DESC
      `,
      [orderId],
    );
    return result.rows.map(mapTransactionRow);
  }

  async listTransactions(input: PaymentTransactionListInput): Promise<PaymentTransactionListResult> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    let index = 1;

    if (input.status) {
      conditions.push(`status = $${index}`);
      values.push(input.status);
      index += 1;
    }
    if (input.orderId) {
      conditions.push(`order_id = $${index}`);
      values.push(input.orderId);
      index += 1;
    }
    if (input.createdFrom) {
      conditions.push(`created_at >= $${index}::timestamptz`);
      values.push(input.createdFrom);
      index += 1;
    }
    if (input.createdTo) {
      conditions.push(`created_at <= $${index}::timestamptz`);
      values.push(input.createdTo);
      index += 1;
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${TRANSACTION_COLUMNS}
        FROM mkp_payment_transactions
        ${whereClause}
        ORDER BY created_at DESC, id DESC
      `,
      values,
    );
    return paginateByCursor(result.rows.map(mapTransactionRow), input);
  }

  async listOpenTransactions(limit: number): Promise<PaymentTransactionRecord[]> {
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${TRANSACTION_COLUMNS}
        FROM mkp_payment_transactions
        WHERE status IN ('initiated', 'pending')
        ORDER BY last_polled_at ASC NULLS FIRST, created_at ASC, id ASC
        LIMIT $1
      `,
      [Math.max(1, limit)],
    );
    return result.rows.map(mapTransactionRow);
  }

  async markPolled(transactionIds: string[], polledAt: string): Promise<void> {
    if (transactionIds.length === 0) {
      return;
    }
    await this.pool.query(
      `
        UPDATE mkp_payment_transactions
        SET last_polled_at = $2
        WHERE id = ANY($1::text[])
      `,
      [transactionIds, polledAt],
    );
  }

  async transitionTransaction(
    id: string,
    fromStatuses: PaymentTransactionStatus[],
    update: TransactionStatusUpdate,
  ): Promise<PaymentTransactionRecord | null> {
    try {
      const result = await this.pool.query<TransactionRow>(
        `
          UPDATE mkp_payment_transactions AS t
          SET status = $2::text,
              updated_at = $3::timestamptz,
              provider_transaction_id = COALESCE($4::text, t.provider_transaction_id),
              payer = COALESCE($5::text, t.payer),
              failure_reason = COALESCE($6::text, t.failure_reason),
              completed_at = COALESCE($7::timestamptz, t.completed_at)
          WHERE t.id = $1
            AND t.status = ANY($8::text[])
            AND (
              $2::text <> 'success'
              OR NOT EXISTS (
                SELECT 1
                FROM mkp_payment_transactions AS s
                WHERE s.order_id = t.order_id
                  AND s.status = 'success'
                  AND s.id <> t.id
              )
            )
          RETURNING t.*
        `,
        [
          id,
          update.status,
          update.updatedAt,
          update.providerTransactionId ?? null,
          update.payer ?? null,
          update.failureReason ?? null,
          update.completedAt ?? null,
          fromStatuses,
        ],
      );
      const row = result.rows[0];
      return row ? mapTransactionRow(row) : null;
    } catch (error) {
      // A concurrent success for the same order won the partial unique index.
      if (isUniqueViolation(error)) {
        return null;
      }
      throw error;
    }
  }

  async appendStatusHistory(entry: PaymentStatusHistoryRecord): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO mkp_payment_status_history (
          id,
          transaction_id,
          old_status,
          new_status,
          reason,
          changed_by,
          changed_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7::timestamptz)
      `,
      [
        entry.id,
        entry.transaction_id,
        entry.old_status,
        entry.new_status,
        entry.reason,
        entry.changed_by,
        entry.changed_at,
      ],
    );
  }

  async listStatusHistory(transactionId: string): Promise<PaymentStatusHistoryRecord[]> {
    const result = await this.pool.query<HistoryRow>(
      `
        SELECT id, transaction_id, old_status, new_status, reason, changed_by, changed_at
        FROM mkp_payment_status_history
        WHERE transaction_id = $1
        ORDER BY changed_at ASC, id ASC
      `,
      [transactionId],
    );
    return result.rows.map((row) => ({
      id: row.id,
      transaction_id: row.transaction_id,
      old_status: row.old_status,
      new_status: row.new_status,
      reason: row.reason,
      changed_by: row.changed_by,
      changed_at: mapTimestamp(row.changed_at),
    }));
  }

  async saveNotification(notification: PaymentNotificationRecord): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO mkp_payment_notifications (
          id,
          transaction_id,
          source,
          raw_data,
          processed,
          outcome,
          processing_error,
          received_at,
          processed_at
        )
        VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $8::timestamptz, $9::timestamptz)
        ON CONFLICT (id) DO UPDATE
        SET transaction_id = EXCLUDED.transaction_id,
            processed = EXCLUDED.processed,
            outcome = EXCLUDED.outcome,
            processing_error = EXCLUDED.processing_error,
            processed_at = EXCLUDED.processed_at
      `,
      [
        notification.id,
        notification.transaction_id,
        notification.source,
        JSON.stringify(notification.raw_data),
        notification.processed,
        notification.outcome,
        notification.processing_error,
        notification.received_at,
        notification.processed_at,
      ],
    );
  }

  async listNotifications(transactionId: string): Promise<PaymentNotificationRecord[]> {
    const result = await this.pool.query<NotificationRow>(
      `
        SELECT
          id,
          transaction_id,
          source,
          raw_data,
          processed,
          outcome,
          processing_error,
          received_at,
          processed_at
        FROM mkp_payment_notifications
        WHERE transaction_id = $1
        ORDER BY received_at ASC, id ASC
      `,
      [transactionId],
    );
    return result.rows.map((row) => ({
      id: row.id,
      transaction_id: row.transaction_id,
      source: row.source,
      raw_data: row.raw_data,
      processed: row.processed,
      outcome: row.outcome,
      processing_error: row.processing_error,
      received_at: mapTimestamp(row.received_at),
      processed_at: mapNullableTimestamp(row.processed_at),
    }));
  }

  async aggregateTransactions(from: string, to: string): Promise<TransactionAggregate> {
    const result = await this.pool.query<{
      success_count: unknown;
      pending_count: unknown;
      failed_count: unknown;
      total_amount: unknown;
    }>(
      `
        SELECT
          COUNT(*) FILTER (WHERE status = 'success') AS success_count,
          COUNT(*) FILTER (WHERE status IN ('initiated', 'pending')) AS pending_count,
          COUNT(*) FILTER (WHERE status = 'failed') AS failed_count,
          COALESCE(SUM(amount) FILTER (WHERE status = 'success'), 0) AS total_amount
        FROM mkp_payment_transactions
        WHERE created_at >= $1::timestamptz
          AND created_at < $2::timestamptz
      `,
      [from, to],
    );
    const row = result.rows[0];
    if (!row) {
      return { success_count: 0, pending_count: 0, failed_count: 0, total_amount: 0 };
    }
    return {
      success_count: toNumber(row.success_count, "success_count"),
      pending_count: toNumber(row.pending_count, "pending_count"),
      failed_count: toNumber(row.failed_count, "failed_count"),
      total_amount: toNumber(row.total_amount, "total_amount"),
    };
  }

  private async findOneTransaction(condition: string, values: unknown[]): Promise<PaymentTransactionRecord | null> {
    const result = await this.pool.query<TransactionRow>(
      `
        SELECT ${TRANSACTION_COLUMNS}
        FROM mkp_payment_transactions
        WHERE ${condition}
        ORDER BY created_at DESC, id DESC
        LIMIT 1
      `,
      values,
    );
    const row = result.rows[0];
    return row ? mapTransactionRow(row) : null;
  }
}
