/**
 * @fileoverview Pulls one batch: checks its size, requests it, splits the
 * body into entries, saves them, and classifies every ID of the batch.
 * @module src/services/KEGG/pull/singlePull
 */

import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  isBinaryEntryField,
  KeggEntryField,
  MAX_ENTRY_IDS_PER_REQUEST,
} from "../core/keggConstants.js";
import { BatchRequester } from "./batchRequester.js";
import { EntrySaver } from "./entrySavers.js";
import { splitEntries } from "./entrySplitter.js";
import { PullResult } from "./pullResult.js";

export class SinglePull {
  constructor(
    private readonly batchRequester: BatchRequester,
    private readonly saver: EntrySaver,
    public readonly entryField?: KeggEntryField,
  ) {}

  /**
   * Whether KEGG can serve `batch` as one request. Only an `INVALID_URL`
   * rejection counts as false; any other error is rethrown.
   */
  public accepts(batch: readonly string[], context: RequestContext): boolean {
    try {
      this.batchRequester.createUrl(batch, this.entryField, context);
      return true;
    } catch (error) {
      if (error instanceof McpError && error.code === BaseErrorCode.INVALID_URL) {
        return false;
      }
      throw error;
    }
  }

  /**
   * @throws {McpError} `BATCH_SIZE_EXCEEDED` for a batch longer than
   *   the per-request maximum, before any request is made.
   */
  public async pull(
    batch: readonly string[],
    context: RequestContext = requestContextService.createRequestContext({
      operation: "SinglePull.pull",
    }),
  ): Promise<PullResult> {
    if (batch.length > MAX_ENTRY_IDS_PER_REQUEST) {
      throw new McpError(
        BaseErrorCode.BATCH_SIZE_EXCEEDED,
        `The maximum number of entry IDs is ${MAX_ENTRY_IDS_PER_REQUEST} but ${batch.length} were provided`,
        { batchSize: batch.length },
      );
    }
    if (batch.length === 0) {
      throw new McpError(BaseErrorCode.VALIDATION_ERROR, "Cannot pull an empty batch");
    }

    const { response } = await this.batchRequester.request(batch, this.entryField, context);
    if (response.status !== "success") {
      return PullResult.of(response.status === "timeout" ? "timed-out" : "failed", batch);
    }

    if (batch.length === 1) {
      const [entryId] = batch;
      const entry = isBinaryEntryField(this.entryField) ? response.binaryBody : response.textBody;
      if (entry.length === 0) {
        logger.warning(`KEGG returned an empty body for ${entryId}`, context);
        return PullResult.of("failed", batch);
      }
      await this.saver.save(entryId, entry, this.entryField, context);
      return PullResult.of("successful", batch);
    }

    const { entries, missing, unattributed } = splitEntries(
      response.textBody,
      batch,
      this.entryField,
    );
    for (const { entryId, entry } of entries) {
      await this.saver.save(entryId, entry, this.entryField, context);
    }
    const split = PullResult.of(
      "successful",
      entries.map(({ entryId }) => entryId),
    );
    if (missing.length === 0) {
      return split;
    }

    if (unattributed > 0) {
      logger.warning(
        `${unattributed} entries in the response could not be matched to an entry ID. ` +
          `Pulling the ${missing.length} unmatched entry IDs one at a time`,
        { ...context, unmatched: missing },
      );
      return split.merge(await this.pullSeparately(missing, context));
    }

    logger.warning(
      `${missing.length} of ${batch.length} requested entries were not found in the response`,
      { ...context, missing },
    );
    return split.with("failed", missing);
  }

  private async pullSeparately(
    entryIds: readonly string[],
    context: RequestContext,
  ): Promise<PullResult> {
    let result = PullResult.empty();
    for (const entryId of entryIds) {
      result = result.merge(await this.pull([entryId], context));
    }
    return result;
  }
}
