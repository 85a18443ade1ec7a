import { pino } from "pino";
import type { BaseLogger } from "pino";

export type Logger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export function createLogger(level = "info"): Logger {
  return pino({ name: "weather-ingest", level });
}

export const silentLogger: Logger = pino({ level: "silent" });
