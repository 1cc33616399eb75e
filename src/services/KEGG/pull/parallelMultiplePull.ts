/**
 * @fileoverview Runs the batches of a pull across a fixed pool of concurrent
 * workers. Workers take batches from one shared queue in input order, each
 * with its own Single Pull, and the orchestrator merges every finished batch
 * and checks the threshold at that moment. Aborting only stops further
 * dispatch: batches already in flight still finish and are merged.
 * @module src/services/KEGG/pull/parallelMultiplePull
 */

import { availableParallelism } from "os";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import { logger, RequestContext } from "../../../utils/index.js";
import {
  MultiplePull,
  MultiplePullOptions,
  SinglePullFactory,
} from "./multiplePull.js";
import { PullResult } from "./pullResult.js";
import { SinglePull } from "./singlePull.js";

export interface ParallelMultiplePullOptions extends MultiplePullOptions {
  /** Defaults to the host's available parallelism. */
  nWorkers?: number;
}

interface DispatchState {
  running: PullResult;
  /** Index of the next batch to hand out. */
  nextBatch: number;
  completedBatches: number;
  stopped: boolean;
  /** `nextBatch` at the moment the threshold was exceeded. */
  abortedAt: number | null;
}

export class ParallelMultiplePull extends MultiplePull {
  public readonly nWorkers: number;

  constructor(createSinglePull: SinglePullFactory, options: ParallelMultiplePullOptions = {}) {
    super(createSinglePull, options);
    const nWorkers = options.nWorkers ?? availableParallelism();
    if (!Number.isInteger(nWorkers) || nWorkers < 1) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Number of workers must be a positive integer but ${nWorkers} was provided`,
      );
    }
    this.nWorkers = nWorkers;
  }

  protected async pullBatches(
    batches: readonly string[][],
    cleaned: readonly string[],
    initial: PullResult,
    context: RequestContext,
  ): Promise<PullResult> {
    const state: DispatchState = {
      running: initial,
      nextBatch: 0,
      completedBatches: 0,
      stopped: false,
      abortedAt: null,
    };

    const worker = async (singlePull: SinglePull, workerId: number): Promise<void> => {
      while (!state.stopped && state.nextBatch < batches.length) {
        const batch = batches[state.nextBatch];
        state.nextBatch++;

        const partial = await singlePull.pull(batch, { ...context, workerId });
        state.running = state.running.merge(partial);
        state.completedBatches++;
        this.reportProgress(state.running, state.completedBatches, batches.length, cleaned.length);

        const batchesRemain = state.nextBatch < batches.length;
        if (!state.stopped && batchesRemain && this.shouldAbort(state.running, cleaned.length)) {
          state.stopped = true;
          state.abortedAt = state.nextBatch;
        }
      }
    };

    const workerCount = Math.min(this.nWorkers, batches.length);
    logger.debug(`Starting ${workerCount} pull workers`, context);
    const outcomes = await Promise.allSettled(
      Array.from({ length: workerCount }, (_, workerId) =>
        worker(this.createSinglePull(), workerId).catch((error: unknown) => {
          // Stop the other workers from taking new batches, then surface the error.
          state.stopped = true;
          throw error;
        }),
      ),
    );

    const rejected = outcomes.find(
      (outcome): outcome is PromiseRejectedResult => outcome.status === "rejected",
    );
    if (rejected) {
      throw rejected.reason;
    }

    if (state.abortedAt !== null) {
      const remaining = batches.slice(state.abortedAt).flat();
      this.logAbort(state.running, remaining.length, context);
      return state.running.finalize(cleaned, remaining);
    }
    return state.running.finalize(cleaned);
  }
}
