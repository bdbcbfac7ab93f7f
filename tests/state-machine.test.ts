import { describe, expect, it } from "vitest";
import {
  assertTransition,
  canInitiatePayment,
  canTransition,
  isTerminalStatus,
} from "../src/domain/state-machine.js";
import { AppError } from "../src/infra/app-error.js";

describe("Payment transaction state machine", () => {
  it("allows the provider-driven transitions", () => {
    expect(canTransition("initiated", "pending")).toBe(true);
    expect(canTransition("initiated", "success")).toBe(true);
    expect(canTransition("initiated", "failed")).toBe(true);
    expect(canTransition("pending", "success")).toBe(true);
    expect(canTransition("pending", "failed")).toBe(true);
  });

  it("never leaves a terminal status", () => {
    expect(canTransition("success", "failed")).toBe(false);
    expect(canTransition("failed", "success")).toBe(false);
    expect(canTransition("pending", "initiated")).toBe(false);
    expect(() => assertTransition("success", "failed")).toThrowError(AppError);
  });

  it("marks terminal statuses", () => {
    expect(isTerminalStatus("success")).toBe(true);
    expect(isTerminalStatus("failed")).toBe(true);
    expect(isTerminalStatus("initiated")).toBe(false);
    expect(isTerminalStatus("pending")).toBe(false);
  });

  it("only lets pending orders start a payment", () => {
    expect(canInitiatePayment("pending")).toBe(true);
    expect(canInitiatePayment("paid")).toBe(false);
    expect(canInitiatePayment("cancelled")).toBe(false);
    expect(canInitiatePayment("failed")).toBe(false);
  });
});
