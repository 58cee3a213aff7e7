import { type Logger, pino } from "pino";
import type { ServiceConfig } from "./config.js";

export type { Logger };

export function createLogger(config: Pick<ServiceConfig, "LOG_LEVEL">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
