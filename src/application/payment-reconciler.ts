import { randomUUID } from "node:crypto";
import {
  AuthError,
  ProviderError,
  ProviderPaymentNotFoundError,
  ProviderUnavailableError,
  InvalidOrderStateError,
  TransactionNotFoundError,
} from "../domain/errors.js";
import { OPEN_TRANSACTION_STATUSES, assertTransition, canInitiatePayment } from "../domain/state-machine.js";
import type {
  NotificationOutcome,
  PaymentNotificationRecord,
  PaymentStatusHistoryRecord,
  PaymentTransactionRecord,
  PaymentTransactionResponse,
  PaymentTransactionStatus,
  ReconcileInput,
  ReconcileOutcome,
  ReconcileSource,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { addSecondsIso } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { PaymentMetricsRegistry } from "../infra/metrics.js";
import type { PaymentProviderPort, ProviderPaymentRecord } from "../ports/payment-provider.js";
import type { PaymentRepositoryPort } from "../ports/payment-repository.js";
import { isTransactionExpired, mapPaymentTransaction } from "./payment-mapper.js";
import type { ProviderSession } from "./provider-session.js";

export interface InitiatePaymentResult {
  transaction: PaymentTransactionResponse;
  payment_token: string;
  redirect_url: string;
}

export interface ReconcileResult {
  outcome: ReconcileOutcome;
  transaction: PaymentTransactionResponse;
}

export interface NotificationResult {
  notification_id: string;
  outcome: NotificationOutcome;
  transaction_id: string | null;
}

export type PollOutcome = ReconcileOutcome | "expired" | "deferred";

export interface PollSummary {
  examined: number;
  outcomes: Partial<Record<PollOutcome, number>>;
}

export interface PaymentReconcilerOptions {
  expiryMinutes: number;
  referenceFactory?: () => string;
}

type ProviderLookup = { kind: "transaction"; id: string } | { kind: "order"; id: string };

interface AppliedOutcome {
  outcome: ReconcileOutcome;
  transaction: PaymentTransactionRecord;
}

export function generateReference(): string {
  return `ORD-${randomUUID().replace(/-/g, "").slice(0, 12).toUpperCase()}`;
}

function readIdentifier(payload: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = payload[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

/** Pulls the identifiers out of a provider callback or redirect; the `status` field is kept only as a hint. */
export function notificationInputFrom(payload: Record<string, unknown>): ReconcileInput {
  const transactionId = readIdentifier(payload, "transactionId", "transaction_id");
  const orderId = readIdentifier(payload, "orderId", "order_id");
  const reportedStatus = readIdentifier(payload, "status");
  return {
    ...(transactionId ? { transactionId } : {}),
    ...(orderId ? { orderId } : {}),
    ...(reportedStatus ? { reportedStatus } : {}),
  };
}

function initiationOutcome(error: unknown): string {
  if (error instanceof AuthError) {
    return "auth_failed";
  }
  if (error instanceof ProviderUnavailableError) {
    return "provider_unavailable";
  }
  if (error instanceof ProviderError) {
    return "rejected";
  }
  return "error";
}

export class PaymentReconciler {
  private readonly referenceFactory: () => string;

  constructor(
    private readonly repository: PaymentRepositoryPort,
    private readonly provider: PaymentProviderPort,
    private readonly session: ProviderSession,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly metrics: PaymentMetricsRegistry,
    private readonly options: PaymentReconcilerOptions,
  ) {
    this.referenceFactory = options.referenceFactory ?? generateReference;
  }

  async initiate(orderId: string): Promise<InitiatePaymentResult> {
    const order = await this.repository.getOrderById(orderId);
    if (!order) {
      throw new AppError(404, "resource_not_found", `Order '${orderId}' not found.`);
    }
    if (!canInitiatePayment(order.status)) {
      this.metrics.recordInitiation("invalid_order_state");
      throw new InvalidOrderStateError(order.id, order.status);
    }

    const reference = this.referenceFactory();
    let paymentToken: string;
    try {
      const created = await this.session.run((token) =>
        this.provider.createPayment(token, { orderId: reference, amount: order.amount }),
      );
      paymentToken = created.paymentToken;
    } catch (error) {
      this.metrics.recordInitiation(initiationOutcome(error));
      if (error instanceof AuthError) {
        this.logger.error({ order_id: order.id, reference, reason: error.reason }, "provider authentication failed during initiation");
      } else if (error instanceof AppError) {
        this.logger.warn({ order_id: order.id, reference, code: error.code, details: error.details }, "payment initiation failed");
      }
      throw error;
    }

    const timestamp = this.clock.nowIso();
    const transaction: PaymentTransactionRecord = {
      id: `ptx_${randomUUID()}`,
      order_id: order.id,
      reference,
      provider: this.provider.name,
      provider_transaction_id: null,
      payment_token: paymentToken,
      amount: order.amount,
      currency: order.currency,
      status: "initiated",
      payer: null,
      failure_reason: null,
      expires_at: addSecondsIso(timestamp, this.options.expiryMinutes * 60),
      completed_at: null,
      created_at: timestamp,
      updated_at: timestamp,
    };
    await this.repository.createTransaction(transaction);
    await this.appendHistory(transaction.id, null, "initiated", "payment created with provider", "initiate");
    this.metrics.recordInitiation("created");
    this.logger.info({ order_id: order.id, transaction_id: transaction.id, reference }, "payment initiated");

    return {
      transaction: this.present(transaction),
      payment_token: paymentToken,
      redirect_url: this.provider.redirectUrl(paymentToken),
    };
  }

  /**
   * Aligns the local transaction with the provider's view of it. The provider is always queried;
   * a status carried by the caller is never applied.
   */
  async reconcile(input: ReconcileInput, source: ReconcileSource): Promise<ReconcileResult> {
    if (!input.transactionId && !input.orderId) {
      throw new AppError(400, "invalid_callback", "transactionId or orderId is required.");
    }

    const { transaction, payment } = await this.resolve(input);
    if (input.reportedStatus && payment && input.reportedStatus.toLowerCase() !== payment.status) {
      this.logger.info(
        { transaction_id: transaction.id, reported_status: input.reportedStatus, provider_status: payment.status, source },
        "reported status disagrees with provider",
      );
    }

    const applied = await this.applyProviderPayment(transaction, payment, source);
    this.metrics.recordReconciliation(source, applied.outcome);
    return { outcome: applied.outcome, transaction: this.present(applied.transaction) };
  }

  async handleProviderNotification(
    payload: Record<string, unknown>,
    source: "callback" | "return",
  ): Promise<NotificationResult> {
    const receivedAt = this.clock.nowIso();
    const notification: PaymentNotificationRecord = {
      id: `pn_${randomUUID()}`,
      transaction_id: null,
      source,
      raw_data: payload,
      processed: false,
      outcome: null,
      processing_error: null,
      received_at: receivedAt,
      processed_at: null,
    };
    await this.repository.saveNotification(notification);

    const input = notificationInputFrom(payload);
    if (!input.transactionId && !input.orderId) {
      await this.repository.saveNotification({
        ...notification,
        processed: true,
        processing_error: "missing transactionId and orderId",
        processed_at: this.clock.nowIso(),
      });
      throw new AppError(400, "invalid_callback", "transactionId or orderId is required.");
    }

    let outcome: NotificationOutcome;
    let transactionId: string | null = null;
    let processingError: string | null = null;
    try {
      const result = await this.reconcile(input, source);
      outcome = result.outcome;
      transactionId = result.transaction.id;
    } catch (error) {
      if (error instanceof TransactionNotFoundError) {
        this.logger.warn({ source, ...input }, "provider notification references an unknown transaction");
        outcome = "not_found";
        processingError = error.message;
      } else if (error instanceof ProviderUnavailableError || error instanceof AuthError) {
        const reason = error instanceof AuthError ? error.reason : error.message;
        this.logger.warn({ source, ...input, reason }, "provider notification deferred");
        outcome = "deferred";
        processingError = reason;
      } else {
        const message = error instanceof Error ? error.message : String(error);
        await this.repository.saveNotification({
          ...notification,
          processed: true,
          processing_error: message,
          processed_at: this.clock.nowIso(),
        });
        throw error;
      }
      this.metrics.recordReconciliation(source, outcome);
    }

    await this.repository.saveNotification({
      ...notification,
      transaction_id: transactionId,
      processed: true,
      outcome,
      processing_error: processingError,
      processed_at: this.clock.nowIso(),
    });
    return { notification_id: notification.id, outcome, transaction_id: transactionId };
  }

  async checkStatus(input: ReconcileInput): Promise<ReconcileResult> {
    return this.reconcile(input, "status_check");
  }

  async pollPending(limit: number): Promise<PollSummary> {
    const open = await this.repository.listOpenTransactions(limit);
    const outcomes: Partial<Record<PollOutcome, number>> = {};
    const count = (outcome: PollOutcome): void => {
      outcomes[outcome] = (outcomes[outcome] ?? 0) + 1;
    };

    for (const transaction of open) {
      let payment: ProviderPaymentRecord | null;
      try {
        payment = await this.queryProvider(this.lookupFor(transaction));
      } catch (error) {
        if (error instanceof ProviderUnavailableError || error instanceof AuthError) {
          this.logger.warn({ transaction_id: transaction.id, code: error.code }, "poll deferred by provider failure");
          this.metrics.recordReconciliation("poll", "deferred");
          count("deferred");
          continue;
        }
        throw error;
      }

      if (!payment && isTransactionExpired(transaction, this.clock.nowIso())) {
        const expired = await this.expire(transaction);
        this.metrics.recordReconciliation("poll", expired);
        count(expired);
        continue;
      }

      const applied = await this.applyProviderPayment(transaction, payment, "poll");
      this.metrics.recordReconciliation("poll", applied.outcome);
      count(applied.outcome);
    }

    // Rows still open rotate behind the ones not yet looked at.
    await this.repository.markPolled(
      open.map((transaction) => transaction.id),
      this.clock.nowIso(),
    );
    this.logger.info({ examined: open.length, outcomes }, "pending payment poll finished");
    return { examined: open.length, outcomes };
  }

  present(transaction: PaymentTransactionRecord): PaymentTransactionResponse {
    return mapPaymentTransaction(transaction, this.clock.nowIso(), (token) => this.provider.redirectUrl(token));
  }

  private async resolve(
    input: ReconcileInput,
  ): Promise<{ transaction: PaymentTransactionRecord; payment: ProviderPaymentRecord | null }> {
    if (input.transactionId) {
      const known = await this.repository.findTransactionByProviderTransactionId(input.transactionId);
      if (known) {
        return { transaction: known, payment: await this.queryProvider({ kind: "transaction", id: input.transactionId }) };
      }
    }

    if (input.orderId) {
      const byOrder =
        (await this.repository.findTransactionByReference(input.orderId)) ??
        (await this.repository.findLatestTransactionForOrder(input.orderId));
      if (byOrder) {
        return { transaction: byOrder, payment: await this.queryProvider({ kind: "order", id: byOrder.reference }) };
      }
    }

    if (input.transactionId) {
      const payment = await this.queryProvider({ kind: "transaction", id: input.transactionId });
      const transaction = payment?.orderId ? await this.repository.findTransactionByReference(payment.orderId) : null;
      if (payment && transaction) {
        return { transaction, payment };
      }
    }

    throw new TransactionNotFoundError({
      ...(input.transactionId ? { transactionId: input.transactionId } : {}),
      ...(input.orderId ? { orderId: input.orderId } : {}),
    });
  }

  private lookupFor(transaction: PaymentTransactionRecord): ProviderLookup {
    if (transaction.provider_transaction_id) {
      return { kind: "transaction", id: transaction.provider_transaction_id };
    }
    return { kind: "order", id: transaction.reference };
  }

  private async queryProvider(lookup: ProviderLookup): Promise<ProviderPaymentRecord | null> {
    try {
      return await this.session.run((token) =>
        lookup.kind === "transaction"
          ? this.provider.retrieveByTransactionId(token, lookup.id)
          : this.provider.retrieveByOrderId(token, lookup.id),
      );
    } catch (error) {
      if (error instanceof ProviderPaymentNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  private async applyProviderPayment(
    transaction: PaymentTransactionRecord,
    payment: ProviderPaymentRecord | null,
    source: ReconcileSource,
  ): Promise<AppliedOutcome> {
    if (!payment || payment.status === "pending") {
      return { outcome: "pending", transaction };
    }

    const amountMatches = payment.amount === transaction.amount;
    const referenceMatches = payment.orderId === null || payment.orderId === transaction.reference;
    if (!amountMatches || !referenceMatches) {
      this.logger.error(
        {
          transaction_id: transaction.id,
          expected_amount: transaction.amount,
          provider_amount: payment.amount,
          expected_reference: transaction.reference,
          provider_reference: payment.orderId,
          source,
        },
        "provider payment does not match local transaction",
      );
      return { outcome: "mismatch", transaction };
    }

    if (payment.status === "success") {
      return this.applySuccess(transaction, payment, source);
    }
    return this.applyFailure(transaction, payment, source);
  }

  private async applySuccess(
    transaction: PaymentTransactionRecord,
    payment: ProviderPaymentRecord,
    source: ReconcileSource,
  ): Promise<AppliedOutcome> {
    if (transaction.status === "success") {
      await this.markOrderPaid(transaction);
      return { outcome: "already_succeeded", transaction };
    }
    if (transaction.status === "failed") {
      this.logger.error(
        { transaction_id: transaction.id, provider_transaction_id: payment.transactionId, source },
        "provider reports success for a failed transaction",
      );
      return { outcome: "conflict", transaction };
    }

    assertTransition(transaction.status, "success");
    const timestamp = this.clock.nowIso();
    const updated = await this.repository.transitionTransaction(transaction.id, OPEN_TRANSACTION_STATUSES, {
      status: "success",
      updatedAt: timestamp,
      completedAt: timestamp,
      ...(payment.transactionId ? { providerTransactionId: payment.transactionId } : {}),
      ...(payment.payer ? { payer: payment.payer } : {}),
    });
    if (!updated) {
      return this.afterLostRace(transaction, "success", source);
    }

    await this.appendHistory(updated.id, transaction.status, "success", payment.message ?? "successful", source);
    await this.markOrderPaid(updated);
    this.logger.info({ transaction_id: updated.id, order_id: updated.order_id, source }, "payment succeeded");
    return { outcome: "succeeded", transaction: updated };
  }

  private async applyFailure(
    transaction: PaymentTransactionRecord,
    payment: ProviderPaymentRecord,
    source: ReconcileSource,
  ): Promise<AppliedOutcome> {
    if (transaction.status === "failed") {
      return { outcome: "already_failed", transaction };
    }
    if (transaction.status === "success") {
      this.logger.error(
        { transaction_id: transaction.id, provider_message: payment.message, source },
        "provider reports failure for a successful transaction",
      );
      return { outcome: "conflict", transaction };
    }

    assertTransition(transaction.status, "failed");
    const reason = payment.message ?? "failed";
    const updated = await this.repository.transitionTransaction(transaction.id, OPEN_TRANSACTION_STATUSES, {
      status: "failed",
      updatedAt: this.clock.nowIso(),
      failureReason: reason,
      ...(payment.transactionId ? { providerTransactionId: payment.transactionId } : {}),
    });
    if (!updated) {
      return this.afterLostRace(transaction, "failed", source);
    }

    await this.appendHistory(updated.id, transaction.status, "failed", reason, source);
    this.logger.info({ transaction_id: updated.id, order_id: updated.order_id, reason, source }, "payment failed");
    return { outcome: "failed", transaction: updated };
  }

  private async expire(transaction: PaymentTransactionRecord): Promise<PollOutcome> {
    const updated = await this.repository.transitionTransaction(transaction.id, OPEN_TRANSACTION_STATUSES, {
      status: "failed",
      updatedAt: this.clock.nowIso(),
      failureReason: "expired",
    });
    if (!updated) {
      const applied = await this.afterLostRace(transaction, "failed", "poll");
      return applied.outcome;
    }
    await this.appendHistory(updated.id, transaction.status, "failed", "expired", "poll");
    this.logger.info({ transaction_id: updated.id, order_id: updated.order_id }, "payment expired");
    return "expired";
  }

  /** A concurrent writer moved the row first; report what it ended up as. */
  private async afterLostRace(
    transaction: PaymentTransactionRecord,
    target: "success" | "failed",
    source: ReconcileSource,
  ): Promise<AppliedOutcome> {
    const current = (await this.repository.getTransactionById(transaction.id)) ?? transaction;
    if (current.status === target) {
      if (target === "success") {
        await this.markOrderPaid(current);
        return { outcome: "already_succeeded", transaction: current };
      }
      return { outcome: "already_failed", transaction: current };
    }
    this.logger.error(
      { transaction_id: current.id, order_id: current.order_id, status: current.status, target, source },
      "conditional transaction update rejected",
    );
    return { outcome: "conflict", transaction: current };
  }

  private async markOrderPaid(transaction: PaymentTransactionRecord): Promise<void> {
    const changed = await this.repository.markOrderPaid(transaction.order_id, this.clock.nowIso());
    if (changed) {
      this.logger.info({ order_id: transaction.order_id, transaction_id: transaction.id }, "order marked paid");
    }
  }

  private async appendHistory(
    transactionId: string,
    oldStatus: PaymentTransactionStatus | null,
    newStatus: PaymentTransactionStatus,
    reason: string,
    changedBy: PaymentStatusHistoryRecord["changed_by"],
  ): Promise<void> {
    await this.repository.appendStatusHistory({
      id: `psh_${randomUUID()}`,
      transaction_id: transactionId,
      old_status: oldStatus,
      new_status: newStatus,
      reason,
      changed_by: changedBy,
      changed_at: this.clock.nowIso(),
    });
  }
}
