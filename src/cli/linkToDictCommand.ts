/**
 * @fileoverview `kegg-pull link-to-dict`: maps entry IDs to the IDs of
 * related entries and prints or saves the mapping as JSON.
 * @module src/cli/linkToDictCommand
 */

import { parseArgs } from "util";
import { KeggRequester } from "../services/KEGG/core/keggRequester.js";
import { KeggRestService } from "../services/KEGG/core/keggRestService.js";
import { KeggMapping, LinkToDict, mappingToJson } from "../services/KEGG/linkToDict.js";
import { requestContextService } from "../utils/index.js";
import { CliIo, handleCliOutput, readListInput, validationError } from "./io.js";

export const LINK_TO_DICT_USAGE = `Usage:
    kegg-pull link-to-dict <source-database> <target-database> [--deduplicate] [--add-glycans] [--add-drugs] [--output=<output>]
    kegg-pull link-to-dict <source-database> <intermediate-database> <target-database> [--deduplicate] [--add-glycans] [--add-drugs] [--output=<output>]
    kegg-pull link-to-dict entry-ids <entry-ids> <target-database> [--conv] [--reverse] [--output=<output>]
    kegg-pull link-to-dict conv <kegg-database> <outside-database> [--reverse] [--output=<output>]

Options:
    --deduplicate       Keep only "path:map" pathway IDs. One of the databases must be "pathway".
    --add-glycans       Add the compound IDs of equivalent glycan entries.
    --add-drugs         Add the compound IDs of equivalent drug entries.
    --conv              Use the KEGG "conv" operation instead of "link" for entry IDs.
    --reverse           Map the target IDs to the source IDs instead.
    --output=<output>   JSON file to write the mapping to. Use "archive.zip:mapping.json" to write into a ZIP archive. Prints it if not given.

<entry-ids> is a comma separated list, or "-" to read one entry ID per line from standard input.`;

export async function runLinkToDictCommand(argv: string[], io: CliIo): Promise<number> {
  const context = requestContextService.createRequestContext({ operation: "cli.linkToDict" });
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      help: { type: "boolean", short: "h" },
      output: { type: "string" },
      deduplicate: { type: "boolean" },
      "add-glycans": { type: "boolean" },
      "add-drugs": { type: "boolean" },
      conv: { type: "boolean" },
      reverse: { type: "boolean" },
    },
  });

  if (values.help) {
    io.write(`${LINK_TO_DICT_USAGE}\n`);
    return 0;
  }

  const linkToDict = new LinkToDict(new KeggRestService(new KeggRequester(io.transport)));
  const linkOptions = {
    deduplicate: values.deduplicate,
    addGlycans: values["add-glycans"],
    addDrugs: values["add-drugs"],
  };
  const reverse = values.reverse ?? false;
  const [first, second, third, ...extra] = positionals;
  if (first === undefined || second === undefined || extra.length > 0) {
    throw validationError(`Invalid arguments for "link-to-dict".\n${LINK_TO_DICT_USAGE}`);
  }

  let mapping: KeggMapping;
  if (first === "entry-ids" && third !== undefined) {
    const entryIds = await readListInput(second, io, context);
    mapping = values.conv
      ? await linkToDict.entriesConv(entryIds, third, reverse, context)
      : await linkToDict.entriesLink(entryIds, third, reverse, context);
  } else if (first === "conv" && third !== undefined) {
    mapping = await linkToDict.databaseConv(second, third, reverse, context);
  } else if (third !== undefined) {
    mapping = await linkToDict.indirectLink(first, second, third, linkOptions, context);
  } else {
    mapping = await linkToDict.databaseLink(first, second, linkOptions, context);
  }

  await handleCliOutput(values.output, mappingToJson(mapping), io, context);
  return 0;
}
