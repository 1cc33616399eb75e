/**
 * @fileoverview Central error handling: converts unknown thrown values into
 * `McpError`, logs them with their context, and optionally rethrows.
 * @module src/utils/internal/errorHandler
 */

import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import { sanitizeInputForLogging } from "../security/sanitization.js";
import { logger } from "./logger.js";
import { RequestContext } from "./requestContext.js";

export interface ErrorHandlerOptions {
  /** Name of the operation that failed, for the log line. */
  operation: string;
  context?: RequestContext | Record<string, unknown>;
  /** Input that led to the failure; sanitized before logging. */
  input?: unknown;
  /** Rethrow the normalized error after logging. Defaults to false. */
  rethrow?: boolean;
  /** Code used when the thrown value is not already an `McpError`. */
  errorCode?: BaseErrorCode;
  /** Logs at `crit` instead of `error`. */
  critical?: boolean;
}

export class ErrorHandler {
  /**
   * Maps any thrown value to an `McpError`, keeping an existing one as is.
   */
  public static toMcpError(
    error: unknown,
    fallbackCode: BaseErrorCode = BaseErrorCode.INTERNAL_ERROR,
  ): McpError {
    if (error instanceof McpError) {
      return error;
    }
    if (error instanceof Error) {
      return new McpError(fallbackCode, error.message, {
        originalErrorName: error.name,
      });
    }
    return new McpError(BaseErrorCode.UNKNOWN_ERROR, String(error));
  }

  /**
   * Logs `error` and returns it as an `McpError`, or rethrows it when
   * `options.rethrow` is set.
   */
  public static handleError(error: unknown, options: ErrorHandlerOptions): McpError {
    const mcpError = ErrorHandler.toMcpError(error, options.errorCode);
    const logContext = {
      ...options.context,
      operation: options.operation,
      errorCode: mcpError.code,
      details: mcpError.details,
      input:
        options.input === undefined
          ? undefined
          : sanitizeInputForLogging(options.input),
    };

    const message = `Error in ${options.operation}: ${mcpError.message}`;
    if (options.critical) {
      logger.crit(message, mcpError, logContext);
    } else {
      logger.error(message, mcpError, logContext);
    }

    if (options.rethrow) {
      throw mcpError;
    }
    return mcpError;
  }

  /**
   * Runs `fn`, passing any failure through `handleError` and rethrowing it.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T>,
    options: Omit<ErrorHandlerOptions, "rethrow">,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw ErrorHandler.handleError(error, { ...options, rethrow: false });
    }
  }
}
