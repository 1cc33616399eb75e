/**
 * @fileoverview `kegg-pull rest`: runs a single KEGG REST operation and
 * prints or saves the response body.
 * @module src/cli/restCommand
 */

import { parseArgs } from "util";
import { z } from "zod";
import { KEGG_ENTRY_FIELD_LIST } from "../services/KEGG/core/keggConstants.js";
import { KeggRequester } from "../services/KEGG/core/keggRequester.js";
import { KeggRestService } from "../services/KEGG/core/keggRestService.js";
import { KeggRequest } from "../services/KEGG/core/keggUrl.js";
import { BaseErrorCode, McpError } from "../types-global/errors.js";
import { requestContextService, RequestContext } from "../utils/index.js";
import {
  CliIo,
  handleCliOutput,
  parseOptionValue,
  splitCommaSeparatedList,
  validationError,
} from "./io.js";
import { molecularAttributeArgs } from "./molecularArgs.js";

export const REST_USAGE = `Usage:
    kegg-pull rest info <database-name> [--output=<output>]
    kegg-pull rest list <database-name> [--output=<output>]
    kegg-pull rest get <entry-ids> [--entry-field=<entry-field>] [--output=<output>]
    kegg-pull rest find <database-name> <keywords> [--output=<output>]
    kegg-pull rest find <database-name> (--formula=<formula>|--exact-mass=<exact-mass>...|--molecular-weight=<molecular-weight>...) [--output=<output>]
    kegg-pull rest conv <kegg-database-name> <outside-database-name> [--output=<output>]
    kegg-pull rest conv --conv-target=<target-database-name> <entry-ids> [--output=<output>]
    kegg-pull rest link <target-database-name> <source-database-name> [--output=<output>]
    kegg-pull rest link --link-target=<target-database-name> <entry-ids> [--output=<output>]
    kegg-pull rest ddi <drug-entry-ids> [--output=<output>]

<entry-ids>, <keywords> and <drug-entry-ids> are comma separated lists.
--output names the file for the response body ("archive.zip:file.txt" writes into a ZIP archive). Prints it if not given.`;

const entryFieldSchema = z.enum(KEGG_ENTRY_FIELD_LIST);

type RestValues = {
  "entry-field"?: string;
  formula?: string;
  "exact-mass"?: string[];
  "molecular-weight"?: string[];
  "conv-target"?: string;
  "link-target"?: string;
};

const usageError = (): McpError =>
  validationError(`Invalid arguments for "rest".\n${REST_USAGE}`);

/** Maps positionals and options to the request they describe. */
export function buildRestRequest(
  positionals: readonly string[],
  values: RestValues,
  context: RequestContext,
): KeggRequest {
  const [operation, first, second, ...extra] = positionals;
  if (first === undefined || extra.length > 0) throw usageError();
  const list = (value: string): string[] => splitCommaSeparatedList(value, context);

  switch (operation) {
    case "info":
      if (second !== undefined) throw usageError();
      return { operation: "info", database: first };
    case "list":
      if (second !== undefined) throw usageError();
      return { operation: "list", database: first };
    case "get":
      if (second !== undefined) throw usageError();
      return {
        operation: "get",
        entryIds: list(first),
        entryField: parseOptionValue(entryFieldSchema, values["entry-field"], "entry-field"),
      };
    case "find":
      if (second !== undefined) {
        return { operation: "find", database: first, keywords: list(second) };
      }
      return {
        operation: "molecular-find",
        database: first,
        ...molecularAttributeArgs(values.formula, values["exact-mass"], values["molecular-weight"]),
      };
    case "conv":
      if (values["conv-target"] !== undefined) {
        if (second !== undefined) throw usageError();
        return { operation: "entries-conv", targetDatabase: values["conv-target"], entryIds: list(first) };
      }
      if (second === undefined) throw usageError();
      return { operation: "database-conv", keggDatabase: first, outsideDatabase: second };
    case "link":
      if (values["link-target"] !== undefined) {
        if (second !== undefined) throw usageError();
        return { operation: "entries-link", targetDatabase: values["link-target"], entryIds: list(first) };
      }
      if (second === undefined) throw usageError();
      return { operation: "database-link", targetDatabase: first, sourceDatabase: second };
    case "ddi":
      if (second !== undefined) throw usageError();
      return { operation: "ddi", drugEntryIds: list(first) };
    default:
      throw usageError();
  }
}

export async function runRestCommand(argv: string[], io: CliIo): Promise<number> {
  const context = requestContextService.createRequestContext({ operation: "cli.rest" });
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      help: { type: "boolean", short: "h" },
      output: { type: "string" },
      "entry-field": { type: "string" },
      formula: { type: "string" },
      "exact-mass": { type: "string", multiple: true },
      "molecular-weight": { type: "string", multiple: true },
      "conv-target": { type: "string" },
      "link-target": { type: "string" },
    },
  });

  if (values.help) {
    io.write(`${REST_USAGE}\n`);
    return 0;
  }

  const request = buildRestRequest(positionals, values, context);
  const rest = new KeggRestService(new KeggRequester(io.transport));
  const response = await rest.request(request, context);

  switch (response.status) {
    case "failed":
      throw new McpError(
        BaseErrorCode.KEGG_API_ERROR,
        `The request to the KEGG web API failed with the following URL: ${response.keggUrl.url}`,
        { statusCode: response.statusCode },
      );
    case "timeout":
      throw new McpError(
        BaseErrorCode.KEGG_API_ERROR,
        `The request to the KEGG web API timed out with the following URL: ${response.keggUrl.url}`,
      );
    case "success": {
      const binary = request.operation === "get" && request.entryField === "image";
      await handleCliOutput(
        values.output,
        binary ? response.binaryBody : response.textBody,
        io,
        context,
      );
      return 0;
    }
  }
}
