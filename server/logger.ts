import { createLogger, format, transports, type Logger } from "winston";
import { config } from "./config";

const { combine, timestamp, errors, json } = format;

export const logger: Logger = createLogger({
  level: config.LOG_LEVEL,
  silent: config.NODE_ENV === "test",
  format: combine(errors({ stack: true }), timestamp(), json()),
  defaultMeta: { service: "site-audit" },
  transports: [new transports.Console()],
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
