import { pino } from "pino";
import type { FastifyBaseLogger } from "fastify";

export type Logger = FastifyBaseLogger;

export interface LoggerOptions {
  level?: string | undefined;
  name?: string | undefined;
}

// Bearer tokens and client secrets must never reach log sinks.
const REDACTED_PATHS = [
  "req.headers.authorization",
  "headers.authorization",
  "authorization",
  "clientSecret",
  "client_secret",
  "assertion",
  "accessToken"
];

export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    name: options?.name ?? "obo-stepup-gateway",
    level: options?.level ?? "info",
    redact: {
      paths: REDACTED_PATHS,
      censor: "[redacted]"
    }
  });
}

export function silentLogger(): Logger {
  return createLogger({ level: "silent" });
}
