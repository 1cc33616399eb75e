/**
 * @fileoverview Winston-backed logger using syslog severity levels.
 * Console output is routed to stderr so that stdout stays reserved for CLI
 * output and the MCP stdio channel. When a logs directory is configured,
 * JSON lines are also written to `combined.log` and `error.log`.
 * @module src/utils/internal/logger
 */

import path from "path";
import winston from "winston";
import { config } from "../../config/index.js";
import { RequestContext } from "./requestContext.js";

export type McpLogLevel =
  | "debug"
  | "info"
  | "notice"
  | "warning"
  | "error"
  | "crit"
  | "alert"
  | "emerg";

type LogContext = RequestContext | Record<string, unknown>;

const isLogContext = (value: unknown): value is LogContext =>
  typeof value === "object" && value !== null && !(value instanceof Error);

function describeError(error: Error): Record<string, unknown> {
  return { error: error.message, stack: error.stack };
}

export class Logger {
  private static instance: Logger | undefined;
  private readonly winstonLogger: winston.Logger;

  private constructor() {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        stderrLevels: [
          "debug",
          "info",
          "notice",
          "warning",
          "error",
          "crit",
          "alert",
          "emerg",
        ],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp({ format: "HH:mm:ss" }),
          winston.format.printf(({ level, message, timestamp }) => {
            return `${String(timestamp)} ${level}: ${String(message)}`;
          }),
        ),
      }),
    ];

    if (config.logsPath) {
      const fileFormat = winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      );
      transports.push(
        new winston.transports.File({
          filename: path.join(config.logsPath, "combined.log"),
          format: fileFormat,
          maxsize: 5 * 1024 * 1024,
          maxFiles: 3,
        }),
        new winston.transports.File({
          filename: path.join(config.logsPath, "error.log"),
          level: "error",
          format: fileFormat,
          maxsize: 5 * 1024 * 1024,
          maxFiles: 3,
        }),
      );
    }

    this.winstonLogger = winston.createLogger({
      levels: winston.config.syslog.levels,
      level: config.logLevel,
      silent: config.environment === "test",
      transports,
    });
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  public notice(message: string, context?: LogContext): void {
    this.log("notice", message, context);
  }

  public warning(message: string, context?: LogContext): void {
    this.log("warning", message, context);
  }

  /**
   * Logs at `error`. Accepts either a context or an error followed by a
   * context.
   */
  public error(
    message: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    this.logWithError("error", message, errorOrContext, context);
  }

  public crit(
    message: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    this.logWithError("crit", message, errorOrContext, context);
  }

  private logWithError(
    level: McpLogLevel,
    message: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(level, message, { ...context, ...describeError(errorOrContext) });
      return;
    }
    this.log(level, message, isLogContext(errorOrContext) ? errorOrContext : context);
  }

  private log(level: McpLogLevel, message: string, context?: LogContext): void {
    this.winstonLogger.log(level, message, { context });
  }
}

export const logger = Logger.getInstance();
