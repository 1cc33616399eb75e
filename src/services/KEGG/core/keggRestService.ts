/**
 * @fileoverview Single-operation wrapper for the KEGG REST API. Each method
 * builds a validated URL for one KEGG operation and runs it through the
 * retrying `KeggRequester`.
 * @module src/services/KEGG/core/keggRestService
 */

import { requestContextService, RequestContext } from "../../../utils/index.js";
import { KeggEntryField } from "./keggConstants.js";
import { KeggRequester, KeggResponse } from "./keggRequester.js";
import {
  createKeggUrl,
  KeggRequest,
  KeggUrl,
  MolecularAttributes,
} from "./keggUrl.js";

export class KeggRestService {
  constructor(
    public readonly requester: KeggRequester = new KeggRequester(),
    private readonly baseUrl?: string,
  ) {}

  public createUrl(request: KeggRequest, context?: RequestContext): KeggUrl {
    return createKeggUrl(request, { baseUrl: this.baseUrl, context });
  }

  /**
   * Runs a request.
   * @throws {McpError} `INVALID_URL` before any network call when the request is invalid.
   */
  public async request(
    request: KeggRequest,
    context: RequestContext = requestContextService.createRequestContext({
      operation: `KeggRestService.${request.operation}`,
    }),
  ): Promise<KeggResponse> {
    const keggUrl = this.createUrl(request, context);
    return this.requester.request(keggUrl, context);
  }

  /** HEAD request; true when KEGG answers 200. */
  public async test(
    request: KeggRequest,
    context: RequestContext = requestContextService.createRequestContext({
      operation: "KeggRestService.test",
    }),
  ): Promise<boolean> {
    const keggUrl = this.createUrl(request, context);
    const response = await this.requester.request(keggUrl, context, "HEAD");
    return response.status === "success";
  }

  public info(database: string, context?: RequestContext): Promise<KeggResponse> {
    return this.request({ operation: "info", database }, context);
  }

  public list(database: string, context?: RequestContext): Promise<KeggResponse> {
    return this.request({ operation: "list", database }, context);
  }

  public get(
    entryIds: readonly string[],
    entryField?: KeggEntryField,
    context?: RequestContext,
  ): Promise<KeggResponse> {
    return this.request({ operation: "get", entryIds, entryField }, context);
  }

  public keywordsFind(
    database: string,
    keywords: readonly string[],
    context?: RequestContext,
  ): Promise<KeggResponse> {
    return this.request({ operation: "find", database, keywords }, context);
  }

  public molecularFind(
    database: string,
    attributes: MolecularAttributes,
    context?: RequestContext,
  ): Promise<KeggResponse> {
    return this.request(
      { operation: "molecular-find", database, ...attributes },
      context,
    );
  }

  public databaseConv(
    keggDatabase: string,
    outsideDatabase: string,
    context?: RequestContext,
  ): Promise<KeggResponse> {
    return this.request(
      { operation: "database-conv", keggDatabase, outsideDatabase },
      context,
    );
  }

  public entriesConv(
    targetDatabase: string,
    entryIds: readonly string[],
    context?: RequestContext,
  ): Promise<KeggResponse> {
    return this.request(
      { operation: "entries-conv", targetDatabase, entryIds },
      context,
    );
  }

  public databaseLink(
    targetDatabase: string,
    sourceDatabase: string,
    context?: RequestContext,
  ): Promise<KeggResponse> {
    return this.request(
      { operation: "database-link", targetDatabase, sourceDatabase },
      context,
    );
  }

  public entriesLink(
    targetDatabase: string,
    entryIds: readonly string[],
    context?: RequestContext,
  ): Promise<KeggResponse> {
    return this.request(
      { operation: "entries-link", targetDatabase, entryIds },
      context,
    );
  }

  public ddi(
    drugEntryIds: readonly string[],
    context?: RequestContext,
  ): Promise<KeggResponse> {
    return this.request({ operation: "ddi", drugEntryIds }, context);
  }
}
