import type { OrderStatus, PaymentTransactionStatus } from "./types.js";
import { AppError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<PaymentTransactionStatus, PaymentTransactionStatus[]> = {
  initiated: ["pending", "success", "failed"],
  pending: ["success", "failed"],
  success: [],
  failed: [],
};

const TERMINAL_STATUSES: Set<PaymentTransactionStatus> = new Set(["success", "failed"]);

export const OPEN_TRANSACTION_STATUSES: PaymentTransactionStatus[] = ["initiated", "pending"];

export function canTransition(current: PaymentTransactionStatus, next: PaymentTransactionStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: PaymentTransactionStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function assertTransition(current: PaymentTransactionStatus, next: PaymentTransactionStatus): void {
  if (canTransition(current, next)) {
    return;
  }
  throw new AppError(
    409,
    "invalid_state_transition",
    `Transition from '${current}' to '${next}' is not allowed.`,
  );
}

export function canInitiatePayment(status: OrderStatus): boolean {
  return status === "pending";
}
