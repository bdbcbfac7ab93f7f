import type { ProviderPaymentStatus } from "../domain/types.js";

export interface ProviderCredentials {
  clientId: string;
  clientSecret: string;
}

export interface ProviderAccessToken {
  value: string;
  expiresAt: string;
}

export interface CreatePaymentInput {
  orderId: string;
  amount: number;
}

export interface CreatePaymentResult {
  paymentToken: string;
  raw: Record<string, unknown>;
}

export interface ProviderPaymentRecord {
  status: ProviderPaymentStatus;
  amount: number;
  orderId: string | null;
  transactionId: string | null;
  payer: string | null;
  message: string | null;
  raw: Record<string, unknown>;
}

export interface PaymentProviderPort {
  readonly name: string;
  authenticate(credentials: ProviderCredentials): Promise<ProviderAccessToken>;
  createPayment(token: string, input: CreatePaymentInput): Promise<CreatePaymentResult>;
  retrieveByTransactionId(token: string, transactionId: string): Promise<ProviderPaymentRecord>;
  retrieveByOrderId(token: string, orderId: string): Promise<ProviderPaymentRecord>;
  redirectUrl(paymentToken: string): string;
}
