/**
 * @fileoverview Barrel file for the shared utilities.
 * @module src/utils/index
 */

export { ErrorHandler } from "./internal/errorHandler.js";
export type { ErrorHandlerOptions } from "./internal/errorHandler.js";
export { logger, Logger } from "./internal/logger.js";
export type { McpLogLevel } from "./internal/logger.js";
export { measureExecution } from "./internal/performance.js";
export type { MeasuredContext } from "./internal/performance.js";
export { requestContextService } from "./internal/requestContext.js";
export type { RequestContext } from "./internal/requestContext.js";
export {
  sanitization,
  sanitizeInputForLogging,
} from "./security/sanitization.js";
