/**
 * @fileoverview Provides a utility for performance monitoring of long-running
 * operations (MCP tool calls and pull runs). A higher-order function wraps the
 * operation, records an OpenTelemetry span, measures execution time and logs a
 * structured metrics event.
 * @module src/utils/internal/performance
 */

import { Attributes, SpanStatusCode, trace } from "@opentelemetry/api";
import {
  ATTR_CODE_FUNCTION,
  ATTR_CODE_NAMESPACE,
  ATTR_EXECUTION_DURATION_MS,
  ATTR_EXECUTION_ERROR_CODE,
  ATTR_EXECUTION_INPUT_BYTES,
  ATTR_EXECUTION_SUCCESS,
} from "../telemetry/semconv.js";
import { config } from "../../config/index.js";
import { McpError } from "../../types-global/errors.js";
import { logger } from "./logger.js";
import { RequestContext } from "./requestContext.js";

/**
 * Calculates the size of a payload in bytes.
 * @private
 */
function getPayloadSize(payload: unknown): number {
  if (!payload) return 0;
  try {
    const stringified = JSON.stringify(payload);
    return stringified === undefined ? 0 : Buffer.byteLength(stringified, "utf8");
  } catch {
    return 0; // Could not stringify
  }
}

export interface MeasuredContext extends RequestContext {
  /** Span and log name of the measured operation. */
  operationName: string;
  /** Groups related operations, e.g. "mcp-tools" or "kegg-pull". */
  namespace: string;
}

/**
 * Runs `fn` inside an active span and logs its duration and outcome.
 *
 * @param fn - The asynchronous operation to measure.
 * @param context - Request context plus the operation's name and namespace.
 * @param inputPayload - Input to the operation, used only for size metrics.
 * @param resultAttributes - Derives extra span attributes from the result.
 * @throws Re-throws any error from `fn` after recording it on the span.
 */
export async function measureExecution<T>(
  fn: () => Promise<T>,
  context: MeasuredContext,
  inputPayload: unknown,
  resultAttributes?: (result: T) => Attributes,
): Promise<T> {
  const tracer = trace.getTracer(
    config.openTelemetry.serviceName,
    config.openTelemetry.serviceVersion,
  );
  const { operationName, namespace } = context;
  const inputBytes = getPayloadSize(inputPayload);

  return tracer.startActiveSpan(`${namespace}:${operationName}`, async (span) => {
    span.setAttributes({
      [ATTR_CODE_FUNCTION]: operationName,
      [ATTR_CODE_NAMESPACE]: namespace,
      [ATTR_EXECUTION_INPUT_BYTES]: inputBytes,
    });

    const startTime = process.hrtime.bigint();
    let isSuccess = false;
    let errorCode: string | undefined;

    try {
      const result = await fn();
      isSuccess = true;
      if (resultAttributes) {
        span.setAttributes(resultAttributes(result));
      }
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof McpError) {
        errorCode = error.code;
      } else if (error instanceof Error) {
        errorCode = "UNHANDLED_ERROR";
      } else {
        errorCode = "UNKNOWN_ERROR";
      }

      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });

      throw error;
    } finally {
      const endTime = process.hrtime.bigint();
      const durationMs = parseFloat(
        (Number(endTime - startTime) / 1_000_000).toFixed(2),
      );

      span.setAttributes({
        [ATTR_EXECUTION_DURATION_MS]: durationMs,
        [ATTR_EXECUTION_SUCCESS]: isSuccess,
      });
      if (errorCode) {
        span.setAttribute(ATTR_EXECUTION_ERROR_CODE, errorCode);
      }

      span.end();

      logger.info(`${operationName} finished.`, {
        ...context,
        metrics: { durationMs, isSuccess, errorCode, inputBytes },
      });
    }
  });
}
