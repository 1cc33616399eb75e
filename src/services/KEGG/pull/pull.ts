/**
 * @fileoverview Entry point for pulling KEGG entries. `pull` saves entries to
 * a directory or ZIP archive and writes the run summary; `pullToMemory` keeps
 * the entries in a map instead.
 * @module src/services/KEGG/pull/pull
 */

import { config } from "../../../config/index.js";
import {
  measureExecution,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  ATTR_PULL_BATCH_COUNT,
  ATTR_PULL_ENTRY_COUNT,
  ATTR_PULL_STATUS,
} from "../../../utils/telemetry/semconv.js";
import { KeggTransport } from "../core/keggCoreApiClient.js";
import { KeggEntryField } from "../core/keggConstants.js";
import { KeggRequester, Sleeper } from "../core/keggRequester.js";
import { KeggRestService } from "../core/keggRestService.js";
import { BatchRequester } from "./batchRequester.js";
import {
  createEntrySaver,
  EntryContent,
  EntrySaver,
  MemoryEntrySaver,
} from "./entrySavers.js";
import {
  MultiplePull,
  PullProgress,
  SequentialMultiplePull,
  UnsuccessfulThreshold,
} from "./multiplePull.js";
import { ParallelMultiplePull } from "./parallelMultiplePull.js";
import { PullResult } from "./pullResult.js";
import { writePullSummary } from "./pullSummary.js";
import { SinglePull } from "./singlePull.js";

export interface PullOptions {
  /** IDs per request, 1 to 10. Defaults to 10. */
  batchSize?: number;
  forceSingleEntry?: boolean;
  /** Run batches on a pool of concurrent workers. */
  multiProcess?: boolean;
  /** Worker count when `multiProcess` is set. */
  nWorkers?: number;
  entryField?: KeggEntryField;
  nTries?: number;
  /** Seconds per attempt. */
  timeout?: number;
  /** Seconds between timed-out attempts. */
  sleepTime?: number;
  /** A bare number is a ratio of the input size. */
  unsuccessfulThreshold?: number | UnsuccessfulThreshold;
  /**
   * Where the run summary goes. Defaults to `config.kegg.pullResultsPath`
   * for `pull` and to no file for `pullToMemory`; null writes nothing.
   */
  resultsPath?: string | null;
  onProgress?: (progress: PullProgress) => void;
  /** Replaces the HTTP client, e.g. with an in-process fake. */
  transport?: KeggTransport;
  sleep?: Sleeper;
  context?: RequestContext;
}

export interface MemoryPullOutcome {
  result: PullResult;
  entries: Map<string, EntryContent>;
}

const toThreshold = (
  threshold: PullOptions["unsuccessfulThreshold"],
): UnsuccessfulThreshold | undefined =>
  typeof threshold === "number" ? { kind: "ratio", value: threshold } : threshold;

/** Wires requester, Single Pull factory and the chosen Multiple Pull variant. */
export function createMultiplePull(saver: EntrySaver, options: PullOptions = {}): MultiplePull {
  const requester = new KeggRequester(
    options.transport,
    {
      nTries: options.nTries,
      timeoutSeconds: options.timeout,
      sleepSeconds: options.sleepTime,
    },
    options.sleep,
  );
  const rest = new KeggRestService(requester);
  const createSinglePull = (): SinglePull =>
    new SinglePull(new BatchRequester(rest), saver, options.entryField);

  const multiplePullOptions = {
    entryField: options.entryField,
    forceSingleEntry: options.forceSingleEntry,
    batchSize: options.batchSize,
    unsuccessfulThreshold: toThreshold(options.unsuccessfulThreshold),
    onProgress: options.onProgress,
  };
  return options.multiProcess
    ? new ParallelMultiplePull(createSinglePull, {
        ...multiplePullOptions,
        nWorkers: options.nWorkers ?? config.kegg.nWorkers,
      })
    : new SequentialMultiplePull(createSinglePull, multiplePullOptions);
}

async function runPull(
  entryIds: readonly string[],
  saver: EntrySaver,
  options: PullOptions,
  resultsPath: string | null,
  operationName: string,
): Promise<PullResult> {
  const context =
    options.context ??
    requestContextService.createRequestContext({ operation: operationName });
  const multiplePull = createMultiplePull(saver, options);

  return measureExecution(
    async () => {
      await saver.open(context);
      let result: PullResult;
      try {
        result = await multiplePull.pull(entryIds, context);
      } finally {
        await saver.close(context);
      }
      if (resultsPath !== null) {
        await writePullSummary(result, resultsPath, context);
      }
      return result;
    },
    { ...context, operationName, namespace: "kegg-pull" },
    { entryCount: entryIds.length, entryField: options.entryField },
    (result) => ({
      [ATTR_PULL_STATUS]: result.status,
      [ATTR_PULL_ENTRY_COUNT]: result.numProcessed + result.remainingEntryIds.length,
      [ATTR_PULL_BATCH_COUNT]: Math.ceil(
        (result.numProcessed + result.remainingEntryIds.length) /
          multiplePull.effectiveBatchSize,
      ),
    }),
  );
}

/**
 * Pulls `entryIds` into `output`, a directory or a path ending in `.zip`.
 * Per-ID failures are reported in the result, never thrown.
 * @throws {McpError} For invalid options or an empty ID list, before any request.
 */
export async function pull(
  entryIds: readonly string[],
  output: string,
  options: PullOptions = {},
): Promise<PullResult> {
  const resultsPath =
    options.resultsPath === undefined ? config.kegg.pullResultsPath : options.resultsPath;
  return runPull(entryIds, createEntrySaver(output), options, resultsPath, "pull");
}

/** Like `pull`, but returns the entries keyed by entry ID. */
export async function pullToMemory(
  entryIds: readonly string[],
  options: PullOptions = {},
): Promise<MemoryPullOutcome> {
  const saver = new MemoryEntrySaver();
  const result = await runPull(
    entryIds,
    saver,
    options,
    options.resultsPath ?? null,
    "pullToMemory",
  );
  return { result, entries: saver.entries };
}
