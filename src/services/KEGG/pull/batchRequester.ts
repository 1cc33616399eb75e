/**
 * @fileoverview Runs one batch of entry IDs as a single KEGG `get` request.
 * @module src/services/KEGG/pull/batchRequester
 */

import { RequestContext, requestContextService } from "../../../utils/index.js";
import { KeggEntryField } from "../core/keggConstants.js";
import { KeggResponse } from "../core/keggRequester.js";
import { KeggRestService } from "../core/keggRestService.js";
import { KeggUrl } from "../core/keggUrl.js";

/** A response kept together with the batch that produced it. */
export interface BatchResponse {
  batch: readonly string[];
  entryField?: KeggEntryField;
  response: KeggResponse;
}

export class BatchRequester {
  constructor(public readonly rest: KeggRestService = new KeggRestService()) {}

  /**
   * The `get` URL for `batch`.
   * @throws {McpError} `INVALID_URL` when KEGG cannot serve the batch.
   */
  public createUrl(
    batch: readonly string[],
    entryField: KeggEntryField | undefined,
    context: RequestContext,
  ): KeggUrl {
    return this.rest.createUrl({ operation: "get", entryIds: batch, entryField }, context);
  }

  /**
   * Network conditions come back classified in `response.status`. A batch
   * KEGG cannot serve (empty, too long, or several IDs with a one-ID field) is
   * rejected with `INVALID_URL` before any request is sent.
   */
  public async request(
    batch: readonly string[],
    entryField: KeggEntryField | undefined,
    context: RequestContext = requestContextService.createRequestContext({
      operation: "BatchRequester.request",
    }),
  ): Promise<BatchResponse> {
    const keggUrl = this.createUrl(batch, entryField, context);
    const response = await this.rest.requester.request(keggUrl, context);
    return { batch, entryField, response };
  }
}
