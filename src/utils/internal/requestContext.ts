/**
 * @fileoverview Utilities for creating and managing request contexts.
 * A request context carries a unique request ID, a timestamp and arbitrary
 * operation metadata, and is passed to every log call so related log lines
 * can be correlated.
 * @module src/utils/internal/requestContext
 */

import { randomUUID } from "node:crypto";

/**
 * Contextual information attached to a single operation.
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  [key: string]: unknown;
}

/** Application identity, recorded once by the entry points. */
interface ContextConfig {
  appName?: string;
  appVersion?: string;
  environment?: string;
}

let contextConfig: ContextConfig = {};

export const requestContextService = {
  /**
   * Updates the service-wide configuration.
   */
  configure(update: Partial<ContextConfig>): ContextConfig {
    contextConfig = { ...contextConfig, ...update };
    return { ...contextConfig };
  },

  /**
   * Creates a new request context stamped with the configured application
   * identity. A `requestId` or `timestamp` passed in `additionalContext`
   * overrides the generated one, which lets child contexts keep their
   * parent's ID.
   */
  createRequestContext(
    additionalContext: Record<string, unknown> = {},
  ): RequestContext {
    return {
      requestId: randomUUID(),
      timestamp: new Date().toISOString(),
      ...contextConfig,
      ...additionalContext,
    };
  },
};
