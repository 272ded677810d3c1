import { createLogger, format, transports, type Logger } from "winston";
import { DEFAULT_SETTINGS, type EngineSettings } from "./config";

/**
 * Console logger with a fixed module tag, e.g.
 *   2026-01-01T00:00:00.000Z [INFO] [ENGINE] deposit committed
 *
 * Silent in the "test" environment so Jest output stays readable.
 */
export function createModuleLogger(
  label: string,
  settings: Pick<EngineSettings, "logLevel" | "environment"> = DEFAULT_SETTINGS
): Logger {
  return createLogger({
    level: settings.logLevel,
    silent: settings.environment === "test",
    format: format.combine(
      format.timestamp(),
      format.printf(
        ({ timestamp, level, message }) =>
          `${timestamp} [${level.toUpperCase()}] [${label}] ${message}`
      )
    ),
    transports: [new transports.Console()],
  });
}
