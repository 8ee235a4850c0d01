import pino, { type Logger } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "soulbound-credentials"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger scoped to one engine component.
 */
export function getComponentLogger(component: string): Logger {
  return logger.child({ component });
}
