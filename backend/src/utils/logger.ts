import pino, { type Logger } from "pino";
import { loadConfig } from "../config";

const baseLogger = pino({
  name: "sierra-scan",
  level: loadConfig().LOG_LEVEL
});

export function createLogger(moduleName: string): Logger {
  return baseLogger.child({ module: moduleName });
}

export const logger = baseLogger;
