/**
 * @fileoverview Runs one KEGG request under the retry policy. The attempt
 * loop is an explicit state machine:
 *
 *   attempting -> succeeded | retrying | exhausted-timeout | failed
 *   retrying   -> attempting (after sleeping)
 *
 * Only timeouts are retried. Any other failure (non-200 status, connection
 * error) ends the loop at once.
 * @module src/services/KEGG/core/keggRequester
 */

import { config } from "../../../config/index.js";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  HttpMethod,
  KeggCoreApiClient,
  KeggTransport,
  TransportResult,
} from "./keggCoreApiClient.js";
import { KeggUrl } from "./keggUrl.js";

export interface RequestPolicy {
  /** Attempts before a timing-out request is given up. At least 1. */
  nTries: number;
  /** Per-attempt timeout. */
  timeoutSeconds: number;
  /** Wait between a timed-out attempt and the next one. */
  sleepSeconds: number;
}

export type KeggResponse =
  | {
      status: "success";
      keggUrl: KeggUrl;
      attempts: number;
      statusCode: number;
      textBody: string;
      binaryBody: Buffer;
    }
  | {
      status: "failed";
      keggUrl: KeggUrl;
      attempts: number;
      statusCode?: number;
      reason: string;
    }
  | { status: "timeout"; keggUrl: KeggUrl; attempts: number };

export type KeggResponseStatus = KeggResponse["status"];

type TransportSuccess = Extract<TransportResult, { status: "success" }>;
type TransportFailure = Extract<TransportResult, { status: "failed" }>;

export type AttemptState =
  | { kind: "attempting"; attempt: number }
  | { kind: "retrying"; attempt: number }
  | { kind: "succeeded"; attempt: number; result: TransportSuccess }
  | { kind: "failed"; attempt: number; result: TransportFailure }
  | { kind: "exhausted-timeout"; attempt: number };

/**
 * The transition taken after attempt number `attempt` produced `result`.
 */
export function nextAttemptState(
  attempt: number,
  result: TransportResult,
  nTries: number,
): AttemptState {
  switch (result.status) {
    case "success":
      return { kind: "succeeded", attempt, result };
    case "failed":
      return { kind: "failed", attempt, result };
    case "timeout":
      return attempt < nTries
        ? { kind: "retrying", attempt }
        : { kind: "exhausted-timeout", attempt };
  }
}

export type Sleeper = (ms: number) => Promise<void>;

const defaultSleeper: Sleeper = (ms) => new Promise((r) => setTimeout(r, ms));

export const DEFAULT_REQUEST_POLICY: RequestPolicy = {
  nTries: config.kegg.nTries,
  timeoutSeconds: config.kegg.timeoutSeconds,
  sleepSeconds: config.kegg.sleepSeconds,
};

export class KeggRequester {
  public readonly policy: RequestPolicy;

  constructor(
    private readonly transport: KeggTransport = new KeggCoreApiClient(),
    policy: Partial<RequestPolicy> = {},
    private readonly sleep: Sleeper = defaultSleeper,
  ) {
    this.policy = { ...DEFAULT_REQUEST_POLICY, ...stripUndefined(policy) };
    if (!Number.isInteger(this.policy.nTries) || this.policy.nTries < 1) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `${this.policy.nTries} is not a valid number of tries to make a KEGG request.`,
      );
    }
    if (!(this.policy.timeoutSeconds > 0)) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `${this.policy.timeoutSeconds} is not a valid time out in seconds for a KEGG request.`,
      );
    }
    if (!(this.policy.sleepSeconds >= 0)) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `${this.policy.sleepSeconds} is not a valid sleep time in seconds.`,
      );
    }
  }

  /**
   * Runs `keggUrl` until it succeeds, fails, or times out `nTries` times.
   * Never throws for network conditions.
   */
  public async request(
    keggUrl: KeggUrl,
    context: RequestContext,
    method: HttpMethod = "GET",
  ): Promise<KeggResponse> {
    const { nTries, timeoutSeconds, sleepSeconds } = this.policy;
    const requestContext = requestContextService.createRequestContext({
      ...context,
      operation: "KeggRequester.request",
      url: keggUrl.url,
    });
    let state: AttemptState = { kind: "attempting", attempt: 1 };

    while (true) {
      switch (state.kind) {
        case "attempting": {
          const result = await this.transport.execute(
            keggUrl,
            timeoutSeconds * 1000,
            requestContext,
            method,
          );
          state = nextAttemptState(state.attempt, result, nTries);
          break;
        }
        case "retrying":
          logger.warning(
            `KEGG request timed out. Retrying (${state.attempt}/${nTries}) in ${sleepSeconds}s...`,
            { ...requestContext, attempt: state.attempt },
          );
          await this.sleep(sleepSeconds * 1000);
          state = { kind: "attempting", attempt: state.attempt + 1 };
          break;
        case "succeeded":
          return {
            status: "success",
            keggUrl,
            attempts: state.attempt,
            statusCode: state.result.statusCode,
            textBody: state.result.textBody,
            binaryBody: state.result.binaryBody,
          };
        case "failed":
          logger.debug(`KEGG request failed: ${state.result.reason}`, requestContext);
          return {
            status: "failed",
            keggUrl,
            attempts: state.attempt,
            statusCode: state.result.statusCode,
            reason: state.result.reason,
          };
        case "exhausted-timeout":
          logger.warning(
            `KEGG request timed out on all ${nTries} attempts`,
            requestContext,
          );
          return { status: "timeout", keggUrl, attempts: state.attempt };
      }
    }
  }
}

function stripUndefined(policy: Partial<RequestPolicy>): Partial<RequestPolicy> {
  const result: Partial<RequestPolicy> = {};
  if (policy.nTries !== undefined) result.nTries = policy.nTries;
  if (policy.timeoutSeconds !== undefined) result.timeoutSeconds = policy.timeoutSeconds;
  if (policy.sleepSeconds !== undefined) result.sleepSeconds = policy.sleepSeconds;
  return result;
}
