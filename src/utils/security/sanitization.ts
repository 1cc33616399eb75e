/**
 * @fileoverview Helpers that make values safe to write to logs.
 * @module src/utils/security/sanitization
 */

const SENSITIVE_KEY_PATTERN = /pass(word)?|secret|token|api[_-]?key|authorization/i;
const MAX_STRING_LENGTH = 500;
const MAX_DEPTH = 6;
const REDACTED = "[REDACTED]";

function sanitizeValue(value: unknown, depth: number): unknown {
  if (typeof value === "string") {
    return value.length > MAX_STRING_LENGTH
      ? `${value.substring(0, MAX_STRING_LENGTH)}... (${value.length} chars)`
      : value;
  }
  if (Buffer.isBuffer(value)) {
    return `<Buffer ${value.length} bytes>`;
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (depth >= MAX_DEPTH) {
    return "[Truncated]";
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item, depth + 1));
  }
  const sanitized: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    sanitized[key] = SENSITIVE_KEY_PATTERN.test(key)
      ? REDACTED
      : sanitizeValue(nested, depth + 1);
  }
  return sanitized;
}

export const sanitization = {
  /**
   * Returns a copy of `input` with secret-looking keys redacted, long strings
   * truncated and buffers summarized. The input is not modified.
   */
  sanitizeForLogging(input: unknown): unknown {
    return sanitizeValue(input, 0);
  },
};

export const sanitizeInputForLogging = (input: unknown): unknown =>
  sanitization.sanitizeForLogging(input);
