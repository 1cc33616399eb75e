/**
 * @fileoverview Turns the two-column output of the KEGG `link` and `conv`
 * operations into mappings from each entry ID to the set of IDs related to
 * it, with optional clean-up of pathway IDs and compound equivalents of
 * glycan and drug entries.
 * @module src/services/KEGG/linkToDict
 */

import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../utils/index.js";
import { KeggRestService } from "./core/keggRestService.js";
import { KeggRequest } from "./core/keggUrl.js";

export type KeggMapping = Map<string, Set<string>>;

export interface DatabaseLinkOptions {
  /**
   * Keep only `path:map` pathway IDs. Requires one of the databases to be
   * "pathway".
   */
  deduplicate?: boolean;
  /** Add the compound IDs of equivalent glycan entries. */
  addGlycans?: boolean;
  /** Add the compound IDs of equivalent drug entries. */
  addDrugs?: boolean;
}

const addToMapping = (mapping: KeggMapping, key: string, values: Iterable<string>): void => {
  const existing = mapping.get(key);
  if (existing) {
    for (const value of values) existing.add(value);
  } else {
    mapping.set(key, new Set(values));
  }
};

/**
 * Parses `from<TAB>to` lines.
 * @throws {McpError} `PARSING_ERROR` for a line without exactly two columns.
 */
export function parseMapping(body: string): KeggMapping {
  const mapping: KeggMapping = new Map();
  for (const line of body.trim().split("\n")) {
    if (line.trim() === "") continue;
    const columns = line.trim().split("\t");
    if (columns.length !== 2) {
      throw new McpError(
        BaseErrorCode.PARSING_ERROR,
        `Expected two tab-separated entry IDs but got: "${line}"`,
      );
    }
    addToMapping(mapping, columns[0], [columns[1]]);
  }
  return mapping;
}

/** Union of both mappings; values of shared keys are merged. */
export function combineMappings(first: KeggMapping, second: KeggMapping): KeggMapping {
  const combined: KeggMapping = new Map();
  for (const mapping of [first, second]) {
    for (const [key, values] of mapping) addToMapping(combined, key, values);
  }
  return combined;
}

export function reverseMapping(mapping: KeggMapping): KeggMapping {
  const reversed: KeggMapping = new Map();
  for (const [key, values] of mapping) {
    for (const value of values) addToMapping(reversed, value, [key]);
  }
  return reversed;
}

/** JSON object of each key to its sorted IDs, keys in insertion order. */
export function mappingToJson(mapping: KeggMapping): string {
  const plain: Record<string, string[]> = {};
  for (const [key, values] of mapping) {
    plain[key] = [...values].sort();
  }
  return JSON.stringify(plain, null, 2);
}

/**
 * Applies `transform` with `relevantDatabase` on the key side, reversing the
 * mapping around the call when it is the target.
 */
async function withRelevantAsSource(
  mapping: KeggMapping,
  sourceDatabase: string,
  targetDatabase: string,
  relevantDatabase: string,
  transform: (mapping: KeggMapping, otherDatabase: string) => KeggMapping | Promise<KeggMapping>,
): Promise<KeggMapping> {
  if (targetDatabase !== relevantDatabase) {
    return transform(mapping, targetDatabase);
  }
  return reverseMapping(await transform(reverseMapping(mapping), sourceDatabase));
}

export class LinkToDict {
  constructor(private readonly rest: KeggRestService = new KeggRestService()) {}

  /** Every entry of `sourceDatabase` mapped to linked entries of `targetDatabase`. */
  public async databaseLink(
    sourceDatabase: string,
    targetDatabase: string,
    options: DatabaseLinkOptions = {},
    context: RequestContext = requestContextService.createRequestContext({
      operation: "LinkToDict.databaseLink",
    }),
  ): Promise<KeggMapping> {
    const mapping = await this.fetchMapping(
      { operation: "database-link", targetDatabase, sourceDatabase },
      context,
    );
    return this.postProcess(mapping, sourceDatabase, targetDatabase, options, context);
  }

  public async databaseConv(
    keggDatabase: string,
    outsideDatabase: string,
    reverse = false,
    context: RequestContext = requestContextService.createRequestContext({
      operation: "LinkToDict.databaseConv",
    }),
  ): Promise<KeggMapping> {
    const mapping = await this.fetchMapping(
      { operation: "database-conv", keggDatabase, outsideDatabase },
      context,
    );
    return reverse ? reverseMapping(mapping) : mapping;
  }

  public async entriesLink(
    entryIds: readonly string[],
    targetDatabase: string,
    reverse = false,
    context: RequestContext = requestContextService.createRequestContext({
      operation: "LinkToDict.entriesLink",
    }),
  ): Promise<KeggMapping> {
    const mapping = await this.fetchMapping(
      { operation: "entries-link", targetDatabase, entryIds },
      context,
    );
    return reverse ? reverseMapping(mapping) : mapping;
  }

  public async entriesConv(
    entryIds: readonly string[],
    targetDatabase: string,
    reverse = false,
    context: RequestContext = requestContextService.createRequestContext({
      operation: "LinkToDict.entriesConv",
    }),
  ): Promise<KeggMapping> {
    const mapping = await this.fetchMapping(
      { operation: "entries-conv", targetDatabase, entryIds },
      context,
    );
    return reverse ? reverseMapping(mapping) : mapping;
  }

  /**
   * Maps `sourceDatabase` to `targetDatabase` through the links both have
   * with `intermediateDatabase` (e.g. ko to compound via reaction).
   * @throws {McpError} `VALIDATION_ERROR` unless the three databases differ.
   */
  public async indirectLink(
    sourceDatabase: string,
    intermediateDatabase: string,
    targetDatabase: string,
    options: DatabaseLinkOptions = {},
    context: RequestContext = requestContextService.createRequestContext({
      operation: "LinkToDict.indirectLink",
    }),
  ): Promise<KeggMapping> {
    if (new Set([sourceDatabase, intermediateDatabase, targetDatabase]).size < 3) {
      throw new McpError(
        BaseErrorCode.VALIDATION_ERROR,
        `The source, intermediate, and target database must all be unique. Databases specified: ${sourceDatabase}, ${intermediateDatabase}, ${targetDatabase}.`,
      );
    }
    const sourceToIntermediate = await this.fetchMapping(
      { operation: "database-link", targetDatabase: intermediateDatabase, sourceDatabase },
      context,
    );
    const intermediateToTarget = await this.fetchMapping(
      {
        operation: "database-link",
        targetDatabase,
        sourceDatabase: intermediateDatabase,
      },
      context,
    );

    const sourceToTarget: KeggMapping = new Map();
    for (const [sourceId, intermediateIds] of sourceToIntermediate) {
      for (const intermediateId of intermediateIds) {
        const targetIds = intermediateToTarget.get(intermediateId);
        if (targetIds) addToMapping(sourceToTarget, sourceId, targetIds);
      }
    }
    return this.postProcess(sourceToTarget, sourceDatabase, targetDatabase, options, context);
  }

  private async postProcess(
    mapping: KeggMapping,
    sourceDatabase: string,
    targetDatabase: string,
    { deduplicate, addGlycans, addDrugs }: DatabaseLinkOptions,
    context: RequestContext,
  ): Promise<KeggMapping> {
    let processed = mapping;
    if (deduplicate) {
      if (sourceDatabase !== "pathway" && targetDatabase !== "pathway") {
        throw new McpError(
          BaseErrorCode.VALIDATION_ERROR,
          `Cannot deduplicate path:map entry ids when neither the source database nor the target database is set to "pathway". Databases specified: ${sourceDatabase}, ${targetDatabase}.`,
        );
      }
      processed = await withRelevantAsSource(
        processed,
        sourceDatabase,
        targetDatabase,
        "pathway",
        (byPathway) =>
          new Map([...byPathway].filter(([pathwayId]) => pathwayId.startsWith("path:map"))),
      );
    }

    if (addGlycans || addDrugs) {
      if (sourceDatabase !== "compound" && targetDatabase !== "compound") {
        logger.warning(
          `Adding compound IDs (corresponding to equivalent glycan and/or drug entries) to a mapping where neither the source database nor the target database are "compound". Databases specified: ${sourceDatabase}, ${targetDatabase}.`,
          context,
        );
      }
      processed = await withRelevantAsSource(
        processed,
        sourceDatabase,
        targetDatabase,
        "compound",
        async (byCompound, otherDatabase) => {
          let combined = byCompound;
          for (const intermediate of [addGlycans ? "glycan" : null, addDrugs ? "drug" : null]) {
            if (intermediate === null) continue;
            const viaEquivalents = await this.indirectLink(
              "compound",
              intermediate,
              otherDatabase,
              {},
              context,
            );
            combined = combineMappings(combined, viaEquivalents);
          }
          return combined;
        },
      );
    }
    return processed;
  }

  /** @throws {McpError} `KEGG_API_ERROR` when the request fails or times out. */
  private async fetchMapping(request: KeggRequest, context: RequestContext): Promise<KeggMapping> {
    const response = await this.rest.request(request, context);
    const { url } = response.keggUrl;
    switch (response.status) {
      case "failed":
        throw new McpError(
          BaseErrorCode.KEGG_API_ERROR,
          `The KEGG request failed with the following URL: ${url}`,
          { url, statusCode: response.statusCode },
        );
      case "timeout":
        throw new McpError(
          BaseErrorCode.KEGG_API_ERROR,
          `The KEGG request timed out with the following URL: ${url}`,
          { url, attempts: response.attempts },
        );
      case "success": {
        const mapping = parseMapping(response.textBody);
        logger.debug(`Mapped ${mapping.size} entry IDs from ${url}`, context);
        return mapping;
      }
    }
  }
}
