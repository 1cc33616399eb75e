/**
 * @fileoverview Logic for the kegg_get_entry_ids MCP tool. Lists the entry
 * IDs of a database, or searches one by keywords or molecular attribute.
 * @module src/mcp-server/tools/keggGetEntryIds/logic
 */

import { z } from "zod";
import { KeggRequester } from "../../../services/KEGG/core/keggRequester.js";
import { KeggRestService } from "../../../services/KEGG/core/keggRestService.js";
import { KeggTransport } from "../../../services/KEGG/core/keggCoreApiClient.js";
import { EntryIdsGetter } from "../../../services/KEGG/entryIds.js";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  RequestContext,
  sanitizeInputForLogging,
} from "../../../utils/index.js";

const MolecularQuerySchema = z
  .array(z.number().positive())
  .min(1)
  .max(2)
  .describe("One value, or two ascending values for a range.");

export const KeggGetEntryIdsInputSchema = z.object({
  source: z
    .enum(["database", "keywords", "molecular-attribute"])
    .describe(
      "'database' lists every entry ID of the database, 'keywords' and 'molecular-attribute' search it.",
    ),
  database: z
    .string()
    .min(1)
    .describe(
      "KEGG database name (e.g. 'compound', 'pathway') or an organism code such as 'hsa'.",
    ),
  keywords: z
    .array(z.string().min(1))
    .optional()
    .describe("Search keywords. Required when source is 'keywords'."),
  formula: z
    .string()
    .min(1)
    .optional()
    .describe("Chemical formula, e.g. 'C7H10O5'. Molecular searches only."),
  exactMass: MolecularQuerySchema.optional(),
  molecularWeight: MolecularQuerySchema.optional(),
  maxResults: z
    .number()
    .int()
    .positive()
    .max(100000)
    .optional()
    .default(1000)
    .describe("Maximum number of entry IDs returned. The total count is always reported."),
});

export type KeggGetEntryIdsInput = z.infer<typeof KeggGetEntryIdsInputSchema>;

export interface KeggGetEntryIdsOutput {
  source: KeggGetEntryIdsInput["source"];
  database: string;
  totalCount: number;
  returnedCount: number;
  entryIds: string[];
}

export interface KeggToolDependencies {
  /** Replaces the HTTP client, e.g. with an in-process fake. */
  transport?: KeggTransport;
}

const singleOrRange = (values?: number[]): number | number[] | undefined =>
  values === undefined || values.length !== 1 ? values : values[0];

export async function keggGetEntryIdsLogic(
  input: KeggGetEntryIdsInput,
  context: RequestContext,
  dependencies: KeggToolDependencies = {},
): Promise<KeggGetEntryIdsOutput> {
  logger.info("Executing kegg_get_entry_ids tool", {
    ...context,
    input: sanitizeInputForLogging(input),
  });

  const getter = new EntryIdsGetter(
    new KeggRestService(new KeggRequester(dependencies.transport)),
  );

  let entryIds: string[];
  switch (input.source) {
    case "database":
      entryIds = await getter.fromDatabase(input.database, context);
      break;
    case "keywords":
      if (!input.keywords || input.keywords.length === 0) {
        throw new McpError(
          BaseErrorCode.VALIDATION_ERROR,
          "Keywords are required when source is 'keywords'",
        );
      }
      entryIds = await getter.fromKeywords(input.database, input.keywords, context);
      break;
    case "molecular-attribute":
      entryIds = await getter.fromMolecularAttribute(
        input.database,
        {
          formula: input.formula,
          exactMass: singleOrRange(input.exactMass),
          molecularWeight: singleOrRange(input.molecularWeight),
        },
        context,
      );
      break;
  }

  const returned = entryIds.slice(0, input.maxResults);
  return {
    source: input.source,
    database: input.database,
    totalCount: entryIds.length,
    returnedCount: returned.length,
    entryIds: returned,
  };
}
