import { describe, expect, it } from "vitest";
import { InMemoryPaymentRepository } from "../src/adapters/inmemory/payment-repository.js";
import { DashboardService } from "../src/application/dashboard-service.js";
import { isMonth, monthOf, monthRange, previousMonth, variation } from "../src/domain/stats.js";
import type { PaymentTransactionRecord, PaymentTransactionStatus } from "../src/domain/types.js";
import { AppError } from "../src/infra/app-error.js";
import { ManualClock } from "./support.js";

let sequence = 0;

function transaction(
  createdAt: string,
  status: PaymentTransactionStatus,
  amount = 1000,
): PaymentTransactionRecord {
  sequence += 1;
  return {
    id: `ptx_dash_${sequence}`,
    order_id: `ord_dash_${sequence}`,
    reference: `ORD-DASH${String(sequence).padStart(8, "0")}`,
    provider: "moncash",
    provider_transaction_id: status === "success" ? String(3_000_000 + sequence) : null,
    payment_token: `pt_dash_${sequence}`,
    amount,
    currency: "HTG",
    status,
    payer: null,
    failure_reason: status === "failed" ? "declined" : null,
    expires_at: createdAt,
    completed_at: status === "success" ? createdAt : null,
    created_at: createdAt,
    updated_at: createdAt,
  };
}

async function seededRepository(): Promise<InMemoryPaymentRepository> {
  const repository = new InMemoryPaymentRepository();
  const rows = [
    transaction("2026-03-01T00:00:00.000Z", "success", 1000),
    transaction("2026-03-10T09:30:00.000Z", "success", 2500),
    transaction("2026-03-12T10:00:00.000Z", "initiated"),
    transaction("2026-03-20T18:45:00.000Z", "pending"),
    transaction("2026-03-31T23:59:59.999Z", "failed"),
    transaction("2026-04-01T00:00:00.000Z", "success", 9000),
    transaction("2026-02-14T08:00:00.000Z", "success", 1000),
    transaction("2026-02-28T12:00:00.000Z", "failed"),
  ];
  for (const row of rows) {
    await repository.createTransaction(row);
  }
  return repository;
}

describe("Monthly stats helpers", () => {
  it("computes percent variation against the previous value", () => {
    expect(variation(150, 100)).toBe(50);
    expect(variation(80, 100)).toBe(-20);
    expect(variation(0, 0)).toBe(0);
    expect(variation(5, 0)).toBe(0);
  });

  it("builds half-open UTC month ranges", () => {
    expect(monthRange("2026-03")).toEqual({
      from: "2026-03-01T00:00:00.000Z",
      to: "2026-04-01T00:00:00.000Z",
    });
    expect(monthRange("2025-12")).toEqual({
      from: "2025-12-01T00:00:00.000Z",
      to: "2026-01-01T00:00:00.000Z",
    });
  });

  it("steps back across year boundaries", () => {
    expect(previousMonth("2026-01")).toBe("2025-12");
    expect(previousMonth("2026-03")).toBe("2026-02");
    expect(monthOf("2026-03-15T12:00:00.000Z")).toBe("2026-03");
  });

  it("keeps two-digit years in their own century", () => {
    expect(monthRange("0050-03")).toEqual({
      from: "0050-03-01T00:00:00.000Z",
      to: "0050-04-01T00:00:00.000Z",
    });
    expect(previousMonth("0050-01")).toBe("0049-12");
    expect(previousMonth("1970-01")).toBe("1969-12");
  });

  it("rejects malformed months", () => {
    expect(() => monthRange("2026-13")).toThrowError(AppError);
    expect(() => monthRange("March")).toThrowError("month must use the YYYY-MM format.");
  });

  it("accepts requested months from 1970 on", () => {
    expect(isMonth("1970-01")).toBe(true);
    expect(isMonth("2026-03")).toBe(true);
    expect(isMonth("1969-12")).toBe(false);
    expect(isMonth("0050-03")).toBe(false);
    expect(isMonth("2026-3")).toBe(false);
  });
});

describe("DashboardService", () => {
  it("aggregates one month of transactions", async () => {
    const service = new DashboardService(await seededRepository(), new ManualClock());

    await expect(service.monthlyStats("2026-03")).resolves.toEqual({
      month: "2026-03",
      success_count: 2,
      pending_count: 2,
      failed_count: 1,
      total_amount: 3500,
    });
  });

  it("compares a month with the one before it", async () => {
    const service = new DashboardService(await seededRepository(), new ManualClock());

    const report = await service.monthlyReport("2026-03");
    expect(report.previous).toEqual({
      month: "2026-02",
      success_count: 1,
      pending_count: 0,
      failed_count: 1,
      total_amount: 1000,
    });
    expect(report.variation).toEqual({
      success_count: 100,
      pending_count: 0,
      failed_count: 0,
      total_amount: 250,
    });
  });

  it("defaults to the current month of the clock", async () => {
    const service = new DashboardService(await seededRepository(), new ManualClock("2026-04-02T08:00:00.000Z"));

    const report = await service.monthlyReport();
    expect(report.current).toEqual({
      month: "2026-04",
      success_count: 1,
      pending_count: 0,
      failed_count: 0,
      total_amount: 9000,
    });
    expect(report.previous.month).toBe("2026-03");
    expect(report.variation.success_count).toBe(-50);
  });
});
