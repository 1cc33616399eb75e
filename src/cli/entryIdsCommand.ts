/**
 * @fileoverview `kegg-pull entry-ids`: lists entry IDs of a database or
 * searches for them.
 * @module src/cli/entryIdsCommand
 */

import { parseArgs } from "util";
import { KeggRequester } from "../services/KEGG/core/keggRequester.js";
import { KeggRestService } from "../services/KEGG/core/keggRestService.js";
import { EntryIdsGetter } from "../services/KEGG/entryIds.js";
import { requestContextService } from "../utils/index.js";
import { molecularAttributeArgs } from "./molecularArgs.js";
import {
  CliIo,
  handleCliOutput,
  splitCommaSeparatedList,
  validationError,
} from "./io.js";

export const ENTRY_IDS_USAGE = `Usage:
    kegg-pull entry-ids database <database-name> [--output=<output>]
    kegg-pull entry-ids keywords <database-name> <keywords> [--output=<output>]
    kegg-pull entry-ids molecular-attribute <database-name> (--formula=<formula>|--exact-mass=<exact-mass>...|--molecular-weight=<molecular-weight>...) [--output=<output>]

Options:
    <keywords>                              Comma separated list of keywords to search entries with.
    --formula=<formula>                     Chemical formula to search for, e.g. "C7H10O5".
    --exact-mass=<exact-mass>               One value, or two (given twice) for a range.
    --molecular-weight=<molecular-weight>   One value, or two (given twice) for a range.
    --output=<output>                       File to write the entry IDs to, one per line. Use "archive.zip:file.txt" to write into a ZIP archive. Prints them if not given.`;

export async function runEntryIdsCommand(argv: string[], io: CliIo): Promise<number> {
  const context = requestContextService.createRequestContext({ operation: "cli.entryIds" });
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      help: { type: "boolean", short: "h" },
      output: { type: "string" },
      formula: { type: "string" },
      "exact-mass": { type: "string", multiple: true },
      "molecular-weight": { type: "string", multiple: true },
    },
  });

  if (values.help) {
    io.write(`${ENTRY_IDS_USAGE}\n`);
    return 0;
  }

  const getter = new EntryIdsGetter(new KeggRestService(new KeggRequester(io.transport)));
  const [source, database, keywords, ...extra] = positionals;
  if (database === undefined || extra.length > 0) {
    throw validationError(`Invalid arguments for "entry-ids".\n${ENTRY_IDS_USAGE}`);
  }

  let entryIds: string[];
  if (source === "database" && keywords === undefined) {
    entryIds = await getter.fromDatabase(database, context);
  } else if (source === "keywords" && keywords !== undefined) {
    entryIds = await getter.fromKeywords(
      database,
      splitCommaSeparatedList(keywords, context),
      context,
    );
  } else if (source === "molecular-attribute" && keywords === undefined) {
    entryIds = await getter.fromMolecularAttribute(
      database,
      molecularAttributeArgs(values.formula, values["exact-mass"], values["molecular-weight"]),
      context,
    );
  } else {
    throw validationError(`Invalid arguments for "entry-ids".\n${ENTRY_IDS_USAGE}`);
  }

  await handleCliOutput(values.output, entryIds.join("\n"), io, context);
  return 0;
}
