import pino from "pino";
import config from "../config/env";

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: config.LOG_LEVEL,
  base: { service: "attendance" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
