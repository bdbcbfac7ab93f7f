import { monthOf, monthRange, previousMonth, variation } from "../domain/stats.js";
import type { MonthlyStats, TransactionAggregate } from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import type { PaymentRepositoryPort } from "../ports/payment-repository.js";

export interface MonthlyReport {
  current: MonthlyStats;
  previous: MonthlyStats;
  variation: Record<keyof TransactionAggregate, number>;
}

export class DashboardService {
  constructor(
    private readonly repository: PaymentRepositoryPort,
    private readonly clock: ClockPort,
  ) {}

  async monthlyStats(month: string): Promise<MonthlyStats> {
    const { from, to } = monthRange(month);
    const aggregate = await this.repository.aggregateTransactions(from, to);
    return { month, ...aggregate };
  }

  async monthlyReport(month?: string): Promise<MonthlyReport> {
    const targetMonth = month ?? monthOf(this.clock.nowIso());
    const [current, previous] = await Promise.all([
      this.monthlyStats(targetMonth),
      this.monthlyStats(previousMonth(targetMonth)),
    ]);
    return {
      current,
      previous,
      variation: {
        success_count: variation(current.success_count, previous.success_count),
        pending_count: variation(current.pending_count, previous.pending_count),
        failed_count: variation(current.failed_count, previous.failed_count),
        total_amount: variation(current.total_amount, previous.total_amount),
      },
    };
  }
}
