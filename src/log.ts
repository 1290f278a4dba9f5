import winston from "winston";
import { readLogLevel, type LogLevel } from "./config.js";

export interface LoggerOptions {
  serviceName?: string;
  /** Defaults to `LOG_LEVEL` from the environment. */
  level?: LogLevel;
  silent?: boolean;
}

export type Logger = winston.Logger;

/**
 * Creates the server logger.
 *
 * Everything goes to stderr: stdout is reserved for the MCP stdio transport.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? readLogLevel();
  const serviceName = opts.serviceName ?? "bopi-mcp";

  const format = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(info => {
      const meta = info.stack ? `\n${String(info.stack)}` : "";
      return `${String(info.timestamp)} [${serviceName}] ${info.level}: ${String(info.message)}${meta}`;
    }),
  );

  return winston.createLogger({
    level,
    format,
    silent: opts.silent ?? false,
    transports: [
      new winston.transports.Console({
        stderrLevels: Object.keys(winston.config.npm.levels),
      }),
    ],
  });
}
