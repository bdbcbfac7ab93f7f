import pino, { type DestinationStream, type Logger } from "pino";
import type { RuntimeConfig } from "./config.js";

export type { Logger } from "pino";

const REDACT_PATHS = [
  "req.headers.authorization",
  "token.value",
  "accessToken",
  "access_token",
  "payment_token",
  // Provider payloads are logged under their own key, one level down.
  "*.clientSecret",
  "*.token.value",
  "*.accessToken",
  "*.access_token",
  "*.payment_token",
];

export function createLogger(config: Pick<RuntimeConfig, "logLevel">, destination?: DestinationStream): Logger {
  const options = {
    level: config.logLevel,
    base: { service: "marketplace-payments" },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };
  return destination ? pino(options, destination) : pino(options);
}

export function createNoopLogger(): Logger {
  return pino({ enabled: false });
}
