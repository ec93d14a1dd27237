import pino from "pino";
import type { Logger } from "pino";
import { config } from "./config";

export const logger: Logger = pino({
  name: "collatz-orbits",
  level: config.logLevel,
});

/**
 * Child logger carrying the given bindings on every line.
 */
export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
