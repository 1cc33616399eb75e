/**
 * @fileoverview Pulls an arbitrary list of entry IDs in request-sized batches.
 * `MultiplePull` holds what both variants share: input cleaning, batch
 * planning (every request URL is built before the first one is sent),
 * progress reporting and the unsuccessful threshold. `SequentialMultiplePull`
 * runs the batches one after another:
 *
 *   idle -> running (batch i of N) -> completed | aborted
 * @module src/services/KEGG/pull/multiplePull
 */

import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  KeggEntryField,
  MAX_ENTRY_IDS_PER_REQUEST,
  onlyOneEntryPerRequest,
} from "../core/keggConstants.js";
import { PullResult } from "./pullResult.js";
import { SinglePull } from "./singlePull.js";

/**
 * Limit on failed plus timed-out IDs. A ratio is taken against the number of
 * IDs in the (cleaned) input. The pull aborts once the limit is exceeded.
 */
export type UnsuccessfulThreshold =
  | { kind: "ratio"; value: number }
  | { kind: "count"; value: number };

export interface PullProgress {
  completedBatches: number;
  totalBatches: number;
  processedEntryIds: number;
  totalEntryIds: number;
  numUnsuccessful: number;
}

export interface MultiplePullOptions {
  entryField?: KeggEntryField;
  forceSingleEntry?: boolean;
  /** IDs per request, 1 to 10. Defaults to 10. */
  batchSize?: number;
  unsuccessfulThreshold?: UnsuccessfulThreshold;
  onProgress?: (progress: PullProgress) => void;
}

/** Each call yields a Single Pull that shares the run's entry saver. */
export type SinglePullFactory = () => SinglePull;

/**
 * @throws {McpError} `VALIDATION_ERROR` for a ratio outside (0, 1) or a
 *   negative or fractional count.
 */
export function validateUnsuccessfulThreshold(threshold: UnsuccessfulThreshold): void {
  if (threshold.kind === "ratio") {
    if (!(threshold.value > 0 && threshold.value < 1)) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Unsuccessful threshold of ${threshold.value} is out of range. Valid values are within 0.0 and 1.0, non-inclusive`,
        { threshold },
      );
    }
    return;
  }
  if (!Number.isInteger(threshold.value) || threshold.value < 0) {
    throw new McpError(
      BaseErrorCode.VALIDATION_ERROR,
      `Maximum number of unsuccessful entry IDs must be a non-negative integer but ${threshold.value} was provided`,
      { threshold },
    );
  }
}

export function isThresholdExceeded(
  threshold: UnsuccessfulThreshold,
  result: PullResult,
  totalEntryIds: number,
): boolean {
  const unsuccessful = result.numUnsuccessful;
  return threshold.kind === "ratio"
    ? unsuccessful / totalEntryIds > threshold.value
    : unsuccessful > threshold.value;
}

/**
 * Drops blank IDs and repeated IDs (first occurrence kept), warning about
 * each kind.
 * @throws {McpError} `VALIDATION_ERROR` when nothing is left.
 */
export function cleanEntryIds(entryIds: readonly string[], context: RequestContext): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  let blanks = 0;

  for (const raw of entryIds) {
    const entryId = raw.trim();
    if (entryId === "") {
      blanks++;
    } else if (seen.has(entryId)) {
      duplicates.add(entryId);
    } else {
      seen.add(entryId);
    }
  }

  if (blanks > 0) {
    logger.warning(`Removed ${blanks} blank entry IDs from the input`, context);
  }
  if (duplicates.size > 0) {
    logger.warning(`Removed repeated entry IDs from the input: ${[...duplicates].join(", ")}`, {
      ...context,
      duplicates: [...duplicates],
    });
  }
  if (seen.size === 0) {
    throw new McpError(BaseErrorCode.VALIDATION_ERROR, "No entry IDs were provided to pull");
  }
  return [...seen];
}

export interface BatchPlan {
  batches: string[][];
  /** IDs that KEGG cannot be asked for even on their own. */
  malformed: string[];
}

/**
 * Groups `entryIds` in order into batches of at most `batchSize` that
 * `accepts` allows as one request. An ID rejected on its own is set aside as
 * malformed; a batch is closed early when the next ID would make it
 * unacceptable (e.g. an over-long URL).
 */
export function planBatches(
  entryIds: readonly string[],
  batchSize: number,
  accepts: (batch: readonly string[]) => boolean,
): BatchPlan {
  const batches: string[][] = [];
  const malformed: string[] = [];
  let current: string[] = [];

  for (const entryId of entryIds) {
    if (!accepts([entryId])) {
      malformed.push(entryId);
      continue;
    }
    const candidate = [...current, entryId];
    if (candidate.length <= batchSize && accepts(candidate)) {
      current = candidate;
    } else {
      batches.push(current);
      current = [entryId];
    }
  }
  if (current.length > 0) {
    batches.push(current);
  }
  return { batches, malformed };
}

export abstract class MultiplePull {
  protected readonly options: MultiplePullOptions;

  constructor(
    protected readonly createSinglePull: SinglePullFactory,
    options: MultiplePullOptions = {},
  ) {
    const { batchSize, unsuccessfulThreshold } = options;
    if (
      batchSize !== undefined &&
      (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_ENTRY_IDS_PER_REQUEST)
    ) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Batch size must be an integer from 1 to ${MAX_ENTRY_IDS_PER_REQUEST} but ${batchSize} was provided`,
      );
    }
    if (unsuccessfulThreshold) {
      validateUnsuccessfulThreshold(unsuccessfulThreshold);
    }
    this.options = options;
  }

  /** 1 when forced or when the entry field allows one ID per request. */
  public get effectiveBatchSize(): number {
    const { forceSingleEntry, entryField, batchSize } = this.options;
    if (forceSingleEntry || onlyOneEntryPerRequest(entryField)) {
      return 1;
    }
    return batchSize ?? MAX_ENTRY_IDS_PER_REQUEST;
  }

  public async pull(
    entryIds: readonly string[],
    context: RequestContext = requestContextService.createRequestContext({
      operation: `${this.constructor.name}.pull`,
    }),
  ): Promise<PullResult> {
    const cleaned = cleanEntryIds(entryIds, context);
    const planner = this.createSinglePull();
    const { batches, malformed } = planBatches(cleaned, this.effectiveBatchSize, (batch) =>
      planner.accepts(batch, context),
    );
    if (malformed.length > 0) {
      logger.warning(
        `Dropping ${malformed.length} entry IDs that cannot form a valid KEGG request: ${malformed.join(", ")}`,
        { ...context, malformed },
      );
    }
    logger.info(
      `Pulling ${cleaned.length - malformed.length} entries in ${batches.length} batches`,
      { ...context, batchSize: this.effectiveBatchSize },
    );

    const result = await this.pullBatches(
      batches,
      cleaned,
      PullResult.of("failed", malformed),
      context,
    );
    logger.info(
      `Pull ${result.status}: ${result.successfulEntryIds.length} successful, ` +
        `${result.failedEntryIds.length} failed, ${result.timedOutEntryIds.length} timed out, ` +
        `${result.remainingEntryIds.length} remaining`,
      context,
    );
    return result;
  }

  /**
   * Merges every pulled batch into `initial` (which holds the IDs dropped
   * while planning) and returns the finalized result.
   */
  protected abstract pullBatches(
    batches: readonly string[][],
    cleaned: readonly string[],
    initial: PullResult,
    context: RequestContext,
  ): Promise<PullResult>;

  protected shouldAbort(running: PullResult, totalEntryIds: number): boolean {
    const { unsuccessfulThreshold } = this.options;
    return (
      unsuccessfulThreshold !== undefined &&
      isThresholdExceeded(unsuccessfulThreshold, running, totalEntryIds)
    );
  }

  protected reportProgress(
    running: PullResult,
    completedBatches: number,
    totalBatches: number,
    totalEntryIds: number,
  ): void {
    this.options.onProgress?.({
      completedBatches,
      totalBatches,
      processedEntryIds: running.numProcessed,
      totalEntryIds,
      numUnsuccessful: running.numUnsuccessful,
    });
  }

  protected logAbort(running: PullResult, remaining: number, context: RequestContext): void {
    logger.warning(
      `Unsuccessful threshold exceeded with ${running.numUnsuccessful} unsuccessful entry IDs. ` +
        `Aborting with ${remaining} entry IDs remaining`,
      context,
    );
  }
}

export class SequentialMultiplePull extends MultiplePull {
  protected async pullBatches(
    batches: readonly string[][],
    cleaned: readonly string[],
    initial: PullResult,
    context: RequestContext,
  ): Promise<PullResult> {
    const singlePull = this.createSinglePull();
    let running = initial;

    for (let i = 0; i < batches.length; i++) {
      running = running.merge(await singlePull.pull(batches[i], context));
      this.reportProgress(running, i + 1, batches.length, cleaned.length);

      const batchesRemain = i < batches.length - 1;
      if (batchesRemain && this.shouldAbort(running, cleaned.length)) {
        const remaining = batches.slice(i + 1).flat();
        this.logAbort(running, remaining.length, context);
        return running.finalize(cleaned, remaining);
      }
    }
    return running.finalize(cleaned);
  }
}
