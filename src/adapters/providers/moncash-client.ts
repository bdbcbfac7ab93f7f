import axios from "axios";
import type { AxiosInstance, AxiosResponse } from "axios";
import { AuthError, ProviderError, ProviderPaymentNotFoundError, ProviderUnavailableError } from "../../domain/errors.js";
import type { ProviderPaymentStatus } from "../../domain/types.js";
import type { ClockPort } from "../../infra/clock.js";
import { SystemClock, addSecondsIso } from "../../infra/clock.js";
import type { Logger } from "../../infra/logger.js";
import { createNoopLogger } from "../../infra/logger.js";
import type { PaymentMetricsRegistry, ProviderCallOutcome } from "../../infra/metrics.js";
import type {
  CreatePaymentInput,
  CreatePaymentResult,
  PaymentProviderPort,
  ProviderAccessToken,
  ProviderCredentials,
  ProviderPaymentRecord,
} from "../../ports/payment-provider.js";

const DEFAULT_TOKEN_LIFETIME_SECONDS = 59;
const FAILED_MESSAGES = new Set(["failed", "failure", "declined", "cancelled", "canceled", "rejected"]);

export interface MonCashClientOptions {
  apiBaseUrl: string;
  gatewayBaseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
  clock?: ClockPort;
  logger?: Logger;
  metrics?: PaymentMetricsRegistry;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string | null {
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function payloadOf(response: AxiosResponse<unknown>): Record<string, unknown> {
  return isRecord(response.data) ? response.data : { body: response.data ?? null };
}

function providerMessage(payload: Record<string, unknown>, fallback: string): string {
  return optionalText(payload.message) ?? optionalText(payload.error) ?? fallback;
}

export function mapProviderStatus(message: string | null): ProviderPaymentStatus {
  const normalized = message?.trim().toLowerCase() ?? "";
  if (normalized === "successful") {
    return "success";
  }
  if (FAILED_MESSAGES.has(normalized)) {
    return "failed";
  }
  return "pending";
}

/** Converts a major-unit amount reported by the provider into minor units. */
export function toMinorUnits(cost: number): number {
  return Math.round(cost * 100);
}

export class MonCashClient implements PaymentProviderPort {
  readonly name = "moncash";
  private readonly http: AxiosInstance;
  private readonly clock: ClockPort;
  private readonly logger: Logger;

  constructor(private readonly options: MonCashClientOptions) {
    this.http = options.http ?? axios.create();
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? createNoopLogger();
  }

  async authenticate(credentials: ProviderCredentials): Promise<ProviderAccessToken> {
    const response = await this.send("authenticate", () =>
      this.http.post<unknown>(`${this.options.apiBaseUrl}/oauth/token`, "scope=read,write&grant_type=client_credentials", {
        auth: { username: credentials.clientId, password: credentials.clientSecret },
        headers: { Accept: "application/json", "Content-Type": "application/x-www-form-urlencoded" },
        timeout: this.options.timeoutMs,
        validateStatus: () => true,
      }),
    ).catch((error: unknown) => {
      if (error instanceof ProviderUnavailableError) {
        throw new AuthError(error.message);
      }
      throw error;
    });

    const payload = payloadOf(response);
    if (response.status < 200 || response.status >= 300) {
      this.recordFailure("authenticate", "auth_failed", response.status, payload);
      throw new AuthError(`token endpoint answered ${response.status}: ${providerMessage(payload, "no message")}`);
    }

    const accessToken = optionalText(payload.access_token);
    if (!accessToken) {
      this.recordFailure("authenticate", "auth_failed", response.status, payload);
      throw new AuthError("token endpoint returned no access_token");
    }
    const expiresIn = typeof payload.expires_in === "number" && payload.expires_in > 0
      ? payload.expires_in
      : DEFAULT_TOKEN_LIFETIME_SECONDS;

    this.options.metrics?.recordProviderCall("authenticate", "ok");
    return { value: accessToken, expiresAt: addSecondsIso(this.clock.nowIso(), expiresIn) };
  }

  async createPayment(token: string, input: CreatePaymentInput): Promise<CreatePaymentResult> {
    const response = await this.post("create_payment", token, "/v1/CreatePayment", {
      amount: input.amount / 100,
      orderId: input.orderId,
    });
    const payload = this.assertSuccess("create_payment", response, input.orderId);

    const paymentToken = isRecord(payload.payment_token) ? optionalText(payload.payment_token.token) : null;
    if (!paymentToken) {
      this.recordFailure("create_payment", "rejected", response.status, payload);
      throw new ProviderError("Provider response did not contain a payment token.", response.status, payload);
    }

    this.options.metrics?.recordProviderCall("create_payment", "ok");
    return { paymentToken, raw: payload };
  }

  async retrieveByTransactionId(token: string, transactionId: string): Promise<ProviderPaymentRecord> {
    const response = await this.post("retrieve_transaction", token, "/v1/RetrieveTransactionPayment", { transactionId });
    return this.toPaymentRecord("retrieve_transaction", response, transactionId);
  }

  async retrieveByOrderId(token: string, orderId: string): Promise<ProviderPaymentRecord> {
    const response = await this.post("retrieve_order", token, "/v1/RetrieveOrderPayment", { orderId });
    return this.toPaymentRecord("retrieve_order", response, orderId);
  }

  redirectUrl(paymentToken: string): string {
    return `${this.options.gatewayBaseUrl}/Payment/Redirect?token=${encodeURIComponent(paymentToken)}`;
  }

  private post(operation: string, token: string, path: string, body: Record<string, unknown>): Promise<AxiosResponse<unknown>> {
    return this.send(operation, () =>
      this.http.post<unknown>(`${this.options.apiBaseUrl}${path}`, body, {
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
        },
        timeout: this.options.timeoutMs,
        validateStatus: () => true,
      }),
    );
  }

  private async send(
    operation: string,
    request: () => Promise<AxiosResponse<unknown>>,
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await request();
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const reason = error.code ?? error.message;
        this.options.metrics?.recordProviderCall(operation, "unavailable");
        this.logger.warn({ operation, reason }, "moncash request failed before a response");
        throw new ProviderUnavailableError(operation, reason);
      }
      throw error;
    }
  }

  private assertSuccess(operation: string, response: AxiosResponse<unknown>, lookup: string): Record<string, unknown> {
    const payload = payloadOf(response);
    const status = response.status;
    if (status >= 200 && status < 300) {
      return payload;
    }
    if (status === 401) {
      this.recordFailure(operation, "auth_failed", status, payload);
      throw new AuthError(`${operation} rejected the access token`, true);
    }
    if (status >= 500) {
      this.recordFailure(operation, "unavailable", status, payload);
      throw new ProviderUnavailableError(operation, `status ${status}`);
    }
    if (status === 404 && operation !== "create_payment") {
      this.recordFailure(operation, "not_found", status, payload);
      throw new ProviderPaymentNotFoundError(lookup, payload);
    }
    this.recordFailure(operation, "rejected", status, payload);
    throw new ProviderError(providerMessage(payload, `Provider rejected ${operation}.`), status, payload);
  }

  private toPaymentRecord(operation: string, response: AxiosResponse<unknown>, lookup: string): ProviderPaymentRecord {
    const payload = this.assertSuccess(operation, response, lookup);
    const payment = payload.payment;
    const cost = isRecord(payment) ? Number(payment.cost) : Number.NaN;
    if (!isRecord(payment) || !Number.isFinite(cost)) {
      this.recordFailure(operation, "rejected", response.status, payload);
      throw new ProviderError("Provider returned a malformed payment record.", response.status, payload);
    }

    const message = optionalText(payment.message);
    this.options.metrics?.recordProviderCall(operation, "ok");
    return {
      status: mapProviderStatus(message),
      amount: toMinorUnits(cost),
      orderId: optionalText(payment.reference),
      transactionId: optionalText(payment.transaction_id),
      payer: optionalText(payment.payer),
      message,
      raw: payload,
    };
  }

  private recordFailure(
    operation: string,
    outcome: ProviderCallOutcome,
    status: number,
    payload: Record<string, unknown>,
  ): void {
    this.options.metrics?.recordProviderCall(operation, outcome);
    this.logger.warn({ operation, status, provider_response: payload }, "moncash request failed");
  }
}
