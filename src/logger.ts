/**
 * pino logger shared by every component.
 */
import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger } from "pino";

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    level,
    base: { service: "index-publisher" },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger used when a component is constructed without one. */
export const logger = createLogger(
  process.env.NODE_ENV === "test" ? "silent" : "info",
);

export function componentLogger(base: Logger, component: string): Logger {
  return base.child({ component });
}
