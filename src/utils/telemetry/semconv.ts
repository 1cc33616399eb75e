/**
 * @fileoverview Span attribute names. The two `code.*` names mirror the
 * OpenTelemetry semantic conventions and are kept local so the project does
 * not depend on a particular `@opentelemetry/semantic-conventions` release;
 * the rest are this project's own attributes.
 * @module src/utils/telemetry/semconv
 */

/** The function name of the measured unit. */
export const ATTR_CODE_FUNCTION = "code.function";

/** The namespace (module, class or tool group) of `code.function`. */
export const ATTR_CODE_NAMESPACE = "code.namespace";

export const ATTR_EXECUTION_DURATION_MS = "kegg.execution.duration_ms";
export const ATTR_EXECUTION_SUCCESS = "kegg.execution.success";
export const ATTR_EXECUTION_ERROR_CODE = "kegg.execution.error_code";
export const ATTR_EXECUTION_INPUT_BYTES = "kegg.execution.input_bytes";

export const ATTR_PULL_ENTRY_COUNT = "kegg.pull.entry_count";
export const ATTR_PULL_BATCH_COUNT = "kegg.pull.batch_count";
export const ATTR_PULL_STATUS = "kegg.pull.status";
