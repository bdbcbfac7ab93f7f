import { randomUUID } from "node:crypto";
import { AuthError, ProviderError, ProviderPaymentNotFoundError, ProviderUnavailableError } from "../../domain/errors.js";
import type { ProviderPaymentStatus } from "../../domain/types.js";
import type { ClockPort } from "../../infra/clock.js";
import { SystemClock, addSecondsIso } from "../../infra/clock.js";
import type {
  CreatePaymentInput,
  CreatePaymentResult,
  PaymentProviderPort,
  ProviderAccessToken,
  ProviderCredentials,
  ProviderPaymentRecord,
} from "../../ports/payment-provider.js";

interface FakeMonCashProviderOptions {
  gatewayBaseUrl?: string;
  tokenLifetimeSeconds?: number;
  clock?: ClockPort;
}

interface FakePayment {
  orderId: string;
  amount: number;
  paymentToken: string;
  transactionId: string | null;
  status: ProviderPaymentStatus;
  payer: string | null;
  message: string | null;
  reportedAmount: number;
}

/**
 * In-process stand-in for the MonCash API. Payments only become visible to the retrieve calls
 * once a test (or a developer) completes or fails them, as with the real provider.
 */
export class FakeMonCashProvider implements PaymentProviderPort {
  readonly name = "moncash";
  private readonly payments = new Map<string, FakePayment>();
  private readonly issuedTokens = new Set<string>();
  private readonly gatewayBaseUrl: string;
  private readonly tokenLifetimeSeconds: number;
  private readonly clock: ClockPort;
  private unavailable = false;
  private rejectCreatePayments = false;
  private authenticateCount = 0;
  private transactionSequence = 0;

  constructor(options: FakeMonCashProviderOptions = {}) {
    this.gatewayBaseUrl = options.gatewayBaseUrl ?? "https://fake-moncash.local/Moncash-middleware";
    this.tokenLifetimeSeconds = options.tokenLifetimeSeconds ?? 59;
    this.clock = options.clock ?? new SystemClock();
  }

  get authenticateCalls(): number {
    return this.authenticateCount;
  }

  async authenticate(credentials: ProviderCredentials): Promise<ProviderAccessToken> {
    if (this.unavailable) {
      throw new AuthError("token endpoint unreachable: fake provider marked unavailable");
    }
    if (credentials.clientId.length === 0 || credentials.clientSecret.length === 0) {
      throw new AuthError("missing client credentials");
    }
    this.authenticateCount += 1;
    const value = `fake_at_${this.authenticateCount}_${randomUUID()}`;
    this.issuedTokens.add(value);
    return { value, expiresAt: addSecondsIso(this.clock.nowIso(), this.tokenLifetimeSeconds) };
  }

  async createPayment(token: string, input: CreatePaymentInput): Promise<CreatePaymentResult> {
    this.assertAvailable("create_payment");
    this.assertToken(token, "create_payment");
    if (this.rejectCreatePayments || input.amount <= 0) {
      const payload = { status: 400, message: "Invalid payment request." };
      throw new ProviderError("Invalid payment request.", 400, payload);
    }
    if (this.payments.has(input.orderId)) {
      const payload = { status: 409, message: `orderId ${input.orderId} already used.` };
      throw new ProviderError(`orderId ${input.orderId} already used.`, 409, payload);
    }

    const paymentToken = `fake_pt_${randomUUID()}`;
    this.payments.set(input.orderId, {
      orderId: input.orderId,
      amount: input.amount,
      paymentToken,
      transactionId: null,
      status: "pending",
      payer: null,
      message: null,
      reportedAmount: input.amount,
    });
    return { paymentToken, raw: { mode: "fake", payment_token: { token: paymentToken } } };
  }

  async retrieveByTransactionId(token: string, transactionId: string): Promise<ProviderPaymentRecord> {
    this.assertAvailable("retrieve_transaction");
    this.assertToken(token, "retrieve_transaction");
    for (const payment of this.payments.values()) {
      if (payment.transactionId === transactionId) {
        return this.toRecord(payment);
      }
    }
    throw new ProviderPaymentNotFoundError(transactionId, { status: 404, message: "Transaction not found." });
  }

  async retrieveByOrderId(token: string, orderId: string): Promise<ProviderPaymentRecord> {
    this.assertAvailable("retrieve_order");
    this.assertToken(token, "retrieve_order");
    const payment = this.payments.get(orderId);
    if (!payment || payment.transactionId === null) {
      throw new ProviderPaymentNotFoundError(orderId, { status: 404, message: "Order not found." });
    }
    return this.toRecord(payment);
  }

  redirectUrl(paymentToken: string): string {
    return `${this.gatewayBaseUrl}/Payment/Redirect?token=${encodeURIComponent(paymentToken)}`;
  }

  /** Simulates the customer paying. Returns the provider transaction id. */
  completePayment(orderId: string, options: { payer?: string; reportedAmount?: number } = {}): string {
    return this.settle(orderId, "success", "successful", options);
  }

  failPayment(orderId: string, message = "failed"): string {
    return this.settle(orderId, "failed", message, {});
  }

  /** Leaves the payment visible with a non-final message. */
  holdPayment(orderId: string, message = "processing"): string {
    return this.settle(orderId, "pending", message, {});
  }

  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  setRejectCreatePayments(reject: boolean): void {
    this.rejectCreatePayments = reject;
  }

  /** Invalidates every token issued so far, as a provider-side expiry would. */
  revokeIssuedTokens(): void {
    this.issuedTokens.clear();
  }

  private settle(
    orderId: string,
    status: ProviderPaymentStatus,
    message: string,
    options: { payer?: string; reportedAmount?: number },
  ): string {
    const payment = this.payments.get(orderId);
    if (!payment) {
      throw new Error(`Fake provider has no payment for order '${orderId}'.`);
    }
    if (payment.transactionId === null) {
      this.transactionSequence += 1;
    }
    const transactionId = payment.transactionId ?? String(2_000_000_000 + this.transactionSequence);
    this.payments.set(orderId, {
      ...payment,
      transactionId,
      status,
      message,
      payer: options.payer ?? payment.payer ?? "50937000000",
      reportedAmount: options.reportedAmount ?? payment.amount,
    });
    return transactionId;
  }

  private toRecord(payment: FakePayment): ProviderPaymentRecord {
    return {
      status: payment.status,
      amount: payment.reportedAmount,
      orderId: payment.orderId,
      transactionId: payment.transactionId,
      payer: payment.payer,
      message: payment.message,
      raw: {
        payment: {
          reference: payment.orderId,
          transaction_id: payment.transactionId,
          cost: payment.reportedAmount / 100,
          message: payment.message,
          payer: payment.payer,
        },
      },
    };
  }

  private assertAvailable(operation: string): void {
    if (this.unavailable) {
      throw new ProviderUnavailableError(operation, "fake provider marked unavailable");
    }
  }

  private assertToken(token: string, operation: string): void {
    if (!this.issuedTokens.has(token)) {
      throw new AuthError(`${operation} rejected the access token`, true);
    }
  }
}
