/**
 * @fileoverview Gets lists of KEGG entry IDs: from a database listing, a
 * keyword search, a molecular attribute search, or a file.
 * @module src/services/KEGG/entryIds
 */

import { readFile } from "fs/promises";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  RequestContext,
  requestContextService,
} from "../../utils/index.js";
import { KeggResponse } from "./core/keggRequester.js";
import { KeggRestService } from "./core/keggRestService.js";
import { MolecularAttributes } from "./core/keggUrl.js";

/**
 * Takes the first tab-separated column of each non-blank line.
 */
export function parseEntryIds(body: string): string[] {
  return body
    .split("\n")
    .map((line) => line.split("\t")[0].trim())
    .filter((entryId) => entryId !== "");
}

export class EntryIdsGetter {
  constructor(private readonly rest: KeggRestService = new KeggRestService()) {}

  public async fromDatabase(
    database: string,
    context: RequestContext = requestContextService.createRequestContext({
      operation: "EntryIdsGetter.fromDatabase",
    }),
  ): Promise<string[]> {
    const response = await this.rest.list(database, context);
    return this.processResponse(response, context);
  }

  public async fromKeywords(
    database: string,
    keywords: readonly string[],
    context: RequestContext = requestContextService.createRequestContext({
      operation: "EntryIdsGetter.fromKeywords",
    }),
  ): Promise<string[]> {
    const response = await this.rest.keywordsFind(database, keywords, context);
    return this.processResponse(response, context);
  }

  public async fromMolecularAttribute(
    database: string,
    attributes: MolecularAttributes,
    context: RequestContext = requestContextService.createRequestContext({
      operation: "EntryIdsGetter.fromMolecularAttribute",
    }),
  ): Promise<string[]> {
    const response = await this.rest.molecularFind(database, attributes, context);
    return this.processResponse(response, context);
  }

  /**
   * Reads one entry ID per line.
   * @throws {McpError} `VALIDATION_ERROR` for an empty file, `STORAGE_ERROR` when it cannot be read.
   */
  public static async fromFile(
    filePath: string,
    context: RequestContext = requestContextService.createRequestContext({
      operation: "EntryIdsGetter.fromFile",
    }),
  ): Promise<string[]> {
    const contents = await ErrorHandler.tryCatch(
      () => readFile(filePath, "utf-8"),
      {
        operation: "EntryIdsGetter.fromFile",
        context,
        input: { filePath },
        errorCode: BaseErrorCode.STORAGE_ERROR,
      },
    );
    if (contents.trim() === "") {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `Attempted to get entry IDs from ${filePath}. But the file is empty`,
        { filePath },
      );
    }
    return parseEntryIds(contents);
  }

  private processResponse(response: KeggResponse, context: RequestContext): string[] {
    const { url } = response.keggUrl;
    switch (response.status) {
      case "failed":
        throw new McpError(
          BaseErrorCode.KEGG_API_ERROR,
          `The KEGG request failed to get the entry IDs from the following URL: ${url}`,
          { url, statusCode: response.statusCode },
        );
      case "timeout":
        throw new McpError(
          BaseErrorCode.KEGG_API_ERROR,
          `The KEGG request timed out while trying to get the entry IDs from the following URL: ${url}`,
          { url, attempts: response.attempts },
        );
      case "success": {
        const entryIds = parseEntryIds(response.textBody);
        logger.info(`Got ${entryIds.length} entry IDs from ${url}`, context);
        return entryIds;
      }
    }
  }
}
