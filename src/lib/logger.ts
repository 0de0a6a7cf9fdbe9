import pino, { type Logger } from "pino";
import { loadConfig } from "../config";

let cachedLogger: Logger | null = null;

export function getLogger(): Logger {
  if (cachedLogger) {
    return cachedLogger;
  }
  const config = loadConfig();
  cachedLogger = pino({
    name: config.OTEL_SERVICE_NAME,
    // Silent under jest.
    level: config.NODE_ENV === "test" ? "silent" : config.LOG_LEVEL,
  });
  return cachedLogger;
}
