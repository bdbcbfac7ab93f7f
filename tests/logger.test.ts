import { describe, expect, it } from "vitest";
import { createLogger } from "../src/infra/logger.js";

function captureLogger() {
  const lines: string[] = [];
  const logger = createLogger({ logLevel: "info" }, {
    write(message: string) {
      lines.push(message);
    },
  });
  return { lines, logger };
}

describe("createLogger", () => {
  it("masks tokens nested in provider responses", () => {
    const { lines, logger } = captureLogger();

    logger.warn(
      {
        operation: "create_payment",
        status: 400,
        provider_response: {
          access_token: "test-access-token",
          payment_token: { token: "test-payment-token", expired: "2026-03-15 12:10:00" },
          message: "Invalid payment request.",
        },
      },
      "moncash request failed",
    );

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? "{}");
    expect(entry.provider_response).toEqual({
      access_token: "[REDACTED]",
      payment_token: "[REDACTED]",
      message: "Invalid payment request.",
    });
    expect(entry.msg).toBe("moncash request failed");
    expect(entry.service).toBe("marketplace-payments");
  });

  it("masks credentials and cached token values", () => {
    const { lines, logger } = captureLogger();

    logger.info(
      {
        credentials: { clientId: "test-client", clientSecret: "test-secret" },
        session: { token: { value: "test-access-token", expiresAt: "2026-03-15T12:00:59.000Z" } },
      },
      "token refreshed",
    );

    const entry = JSON.parse(lines[0] ?? "{}");
    expect(entry.credentials).toEqual({ clientId: "test-client", clientSecret: "[REDACTED]" });
    expect(entry.session.token).toEqual({ value: "[REDACTED]", expiresAt: "2026-03-15T12:00:59.000Z" });
  });
});
