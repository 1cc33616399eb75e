/**
 * @fileoverview Logic for the kegg_pull_entries MCP tool. Pulls entries
 * either into a directory/ZIP archive or, when no output is given, into
 * memory so their text can be returned to the client.
 * @module src/mcp-server/tools/keggPullEntries/logic
 */

import { z } from "zod";
import {
  KEGG_ENTRY_FIELD_LIST,
  MAX_ENTRY_IDS_PER_REQUEST,
} from "../../../services/KEGG/core/keggConstants.js";
import { pull, pullToMemory, PullOptions } from "../../../services/KEGG/pull/pull.js";
import { PullResult } from "../../../services/KEGG/pull/pullResult.js";
import {
  PullSummary,
  summarizePullResult,
} from "../../../services/KEGG/pull/pullSummary.js";
import { logger, RequestContext, sanitizeInputForLogging } from "../../../utils/index.js";
import { KeggToolDependencies } from "../keggGetEntryIds/logic.js";

export const KeggPullEntriesInputSchema = z.object({
  entryIds: z
    .array(z.string().min(1))
    .min(1)
    .max(5000)
    .describe("KEGG entry IDs to pull, e.g. ['cpd:C00001', 'hsa:10458']."),
  entryField: z
    .enum(KEGG_ENTRY_FIELD_LIST)
    .optional()
    .describe(
      "Pull a field (aaseq, ntseq, mol, kcf, image, conf, kgml, json) instead of the full flat-file entry.",
    ),
  output: z
    .string()
    .min(1)
    .optional()
    .describe(
      "Directory, or path ending in '.zip', to save entries to. When omitted the entries are returned.",
    ),
  forceSingleEntry: z
    .boolean()
    .optional()
    .default(false)
    .describe("Request one entry at a time (required for brite entries)."),
  batchSize: z
    .number()
    .int()
    .min(1)
    .max(MAX_ENTRY_IDS_PER_REQUEST)
    .optional()
    .describe(`Entry IDs per request, 1 to ${MAX_ENTRY_IDS_PER_REQUEST}.`),
  multiProcess: z
    .boolean()
    .optional()
    .default(false)
    .describe("Run batches on a pool of concurrent workers."),
  nWorkers: z.number().int().positive().max(64).optional(),
  unsuccessfulThreshold: z
    .number()
    .gt(0)
    .lt(1)
    .optional()
    .describe("Abort once this fraction of entry IDs has failed or timed out."),
});

export type KeggPullEntriesInput = z.infer<typeof KeggPullEntriesInputSchema>;

export interface KeggPullEntriesOutput {
  status: PullResult["status"];
  summary: PullSummary;
  output?: string;
  /** Entry text keyed by entry ID; base64 for image entries. */
  entries?: Record<string, string>;
}

export async function keggPullEntriesLogic(
  input: KeggPullEntriesInput,
  context: RequestContext,
  dependencies: KeggToolDependencies = {},
): Promise<KeggPullEntriesOutput> {
  logger.info("Executing kegg_pull_entries tool", {
    ...context,
    input: sanitizeInputForLogging(input),
  });

  const options: PullOptions = {
    entryField: input.entryField,
    forceSingleEntry: input.forceSingleEntry,
    batchSize: input.batchSize,
    multiProcess: input.multiProcess,
    nWorkers: input.nWorkers,
    unsuccessfulThreshold: input.unsuccessfulThreshold,
    resultsPath: null,
    transport: dependencies.transport,
    context,
  };

  if (input.output !== undefined) {
    const result = await pull(input.entryIds, input.output, options);
    return {
      status: result.status,
      summary: summarizePullResult(result),
      output: input.output,
    };
  }

  const { result, entries } = await pullToMemory(input.entryIds, options);
  const serialized: Record<string, string> = {};
  for (const [entryId, entry] of entries) {
    serialized[entryId] = typeof entry === "string" ? entry : entry.toString("base64");
  }
  return {
    status: result.status,
    summary: summarizePullResult(result),
    entries: serialized,
  };
}
