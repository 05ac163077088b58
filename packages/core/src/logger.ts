import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  transport:
    process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test"
      ? { target: "pino/file", options: { destination: 2 } }
      : undefined,
});

export type Logger = typeof logger;

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
