import pino, { type Logger } from "pino";
import { env } from "./config/env";

/**
 * Root logger with structured logging
 */
export const logger = pino({
  name: "knowledge-store",
  level: env.LOG_LEVEL,
});

export type { Logger };

/**
 * Create a child logger for a component
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
