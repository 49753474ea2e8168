/**
 * Structured logging with payload redaction and per-task correlation.
 *
 * Redaction policy:
 * - Message bodies and credentials never reach the log at any level
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";
import { getCurrentContext } from "../core/correlation.js";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "vaultflow",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "payload.text",
        "*.payload.text",
        "task.payload",
        "credentials",
        "password",
        "token",
        "*.password",
        "*.token",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getCurrentContext();
      if (ctx) {
        return {
          correlationId: ctx.correlationId,
          ...(ctx.taskId ? { taskId: ctx.taskId } : {}),
        };
      }
      return {};
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });

  return logger;
}

export type Logger = pino.Logger;

export const logger = createLogger();
