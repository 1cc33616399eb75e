/**
 * @fileoverview Defines the standardized error codes and the `McpError` class
 * raised throughout the application. Every error that crosses a module
 * boundary is an `McpError`, so callers can branch on `code` instead of on
 * message text.
 * @module src/types-global/errors
 */

/**
 * Error codes shared by the KEGG services, the pull orchestration layer, the
 * CLI and the MCP server.
 */
export enum BaseErrorCode {
  /** Input failed validation (bad option values, empty ID lists, ...). */
  VALIDATION_ERROR = "VALIDATION_ERROR",
  /** A batch longer than the per-request maximum reached Single Pull. */
  BATCH_SIZE_EXCEEDED = "BATCH_SIZE_EXCEEDED",
  /** A KEGG REST URL could not be constructed from the given arguments. */
  INVALID_URL = "INVALID_URL",
  /** KEGG answered a non-pull request with a failure or timed out. */
  KEGG_API_ERROR = "KEGG_API_ERROR",
  /** Reading or writing pulled entries or result files failed. */
  STORAGE_ERROR = "STORAGE_ERROR",
  /** Two partial pull results covering the same entry IDs were merged. */
  PULL_RESULT_CONFLICT = "PULL_RESULT_CONFLICT",
  /** Startup of a component (tool registration, transport) failed. */
  INITIALIZATION_FAILED = "INITIALIZATION_FAILED",
  /** A KEGG response body did not have the expected shape. */
  PARSING_ERROR = "PARSING_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

export class McpError extends Error {
  public readonly code: BaseErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: BaseErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "McpError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, McpError.prototype);
  }

  /**
   * Serializable view used in tool results and structured logs.
   */
  public toJSON(): {
    code: BaseErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return { code: this.code, message: this.message, details: this.details };
  }
}
