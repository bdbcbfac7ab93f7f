import { Counter, Histogram, Registry } from "prom-client";

export type ProviderCallOutcome = "ok" | "not_found" | "rejected" | "auth_failed" | "unavailable";

export class PaymentMetricsRegistry {
  private readonly registry = new Registry();

  private readonly httpRequests = new Counter({
    name: "payments_http_requests_total",
    help: "Total number of HTTP requests handled by route, method, and status code.",
    labelNames: ["method", "route", "status_code"] as const,
    registers: [this.registry],
  });

  private readonly httpDuration = new Histogram({
    name: "payments_http_request_duration_seconds",
    help: "HTTP request duration in seconds by route and method.",
    labelNames: ["method", "route"] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [this.registry],
  });

  private readonly providerCalls = new Counter({
    name: "payments_provider_calls_total",
    help: "Outbound provider calls by operation and outcome.",
    labelNames: ["operation", "outcome"] as const,
    registers: [this.registry],
  });

  private readonly initiations = new Counter({
    name: "payments_initiations_total",
    help: "Payment initiation attempts by outcome.",
    labelNames: ["outcome"] as const,
    registers: [this.registry],
  });

  private readonly reconciliations = new Counter({
    name: "payments_reconciliations_total",
    help: "Reconciliation outcomes by trigger source.",
    labelNames: ["source", "outcome"] as const,
    registers: [this.registry],
  });

  get contentType(): string {
    return this.registry.contentType;
  }

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    const upperMethod = method.toUpperCase();
    this.httpRequests.inc({ method: upperMethod, route, status_code: String(statusCode) });
    this.httpDuration.observe({ method: upperMethod, route }, durationSeconds);
  }

  recordProviderCall(operation: string, outcome: ProviderCallOutcome): void {
    this.providerCalls.inc({ operation, outcome });
  }

  recordInitiation(outcome: string): void {
    this.initiations.inc({ outcome });
  }

  recordReconciliation(source: string, outcome: string): void {
    this.reconciliations.inc({ source, outcome });
  }

  async renderPrometheus(): Promise<string> {
    return this.registry.metrics();
  }
}
