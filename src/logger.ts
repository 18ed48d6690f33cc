/**
 * reqline - Logging
 */

import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Structured debug log on stderr, separate from the diagnostic lines
 */
export function createLogger(level = "warn"): Logger {
  return pino({ name: "reqline", level }, pino.destination(2));
}

export const silentLogger: Logger = pino({ name: "reqline", level: "silent" });
