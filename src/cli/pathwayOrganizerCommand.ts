/**
 * @fileoverview `kegg-pull pathway-organizer`: flattens the pathway Brite
 * hierarchy and prints or saves it as JSON.
 * @module src/cli/pathwayOrganizerCommand
 */

import { parseArgs } from "util";
import { KeggRequester } from "../services/KEGG/core/keggRequester.js";
import { KeggRestService } from "../services/KEGG/core/keggRestService.js";
import {
  hierarchyNodesToJson,
  PathwayOrganizer,
} from "../services/KEGG/pathwayOrganizer.js";
import { RequestContext, requestContextService } from "../utils/index.js";
import { CliIo, handleCliOutput, readListInput, validationError } from "./io.js";

export const PATHWAY_ORGANIZER_USAGE = `Usage:
    kegg-pull pathway-organizer [--tln=<top-level-nodes>] [--fn=<filter-nodes>] [--output=<output>]

Options:
    --tln=<top-level-nodes>   Names of the top-level categories to keep. All of them if not given.
    --fn=<filter-nodes>       Names of nodes to leave out, together with everything below them.
    --output=<output>         JSON file to write the nodes to. Use "archive.zip:nodes.json" to write into a ZIP archive. Prints them if not given.

Both lists are comma separated, or "-" to read one name per line from standard input. When both are "-", give the top-level nodes first, then a line "---", then the filter nodes.`;

const STDIN_LIST_DELIMITER = "---";

/** Splits stdin into the two lists given around the delimiter line. */
async function readBothFromStdin(io: CliIo): Promise<[string[], string[]]> {
  const lines = (await io.readStdin()).split("\n").map((line) => line.trim());
  const delimiter = lines.indexOf(STDIN_LIST_DELIMITER);
  if (delimiter === -1) {
    throw validationError(
      `When both --tln and --fn are "-", standard input must separate them with a "${STDIN_LIST_DELIMITER}" line`,
    );
  }
  const nonBlank = (items: string[]) => items.filter((item) => item !== "");
  return [nonBlank(lines.slice(0, delimiter)), nonBlank(lines.slice(delimiter + 1))];
}

async function readNodeLists(
  tln: string | undefined,
  fn: string | undefined,
  io: CliIo,
  context: RequestContext,
): Promise<[string[] | undefined, string[] | undefined]> {
  if (tln === "-" && fn === "-") {
    return readBothFromStdin(io);
  }
  return [
    tln === undefined ? undefined : await readListInput(tln, io, context),
    fn === undefined ? undefined : await readListInput(fn, io, context),
  ];
}

export async function runPathwayOrganizerCommand(argv: string[], io: CliIo): Promise<number> {
  const context = requestContextService.createRequestContext({ operation: "cli.pathwayOrganizer" });
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      help: { type: "boolean", short: "h" },
      output: { type: "string" },
      tln: { type: "string" },
      fn: { type: "string" },
    },
  });

  if (values.help) {
    io.write(`${PATHWAY_ORGANIZER_USAGE}\n`);
    return 0;
  }
  if (positionals.length > 0) {
    throw validationError(`Invalid arguments for "pathway-organizer".\n${PATHWAY_ORGANIZER_USAGE}`);
  }

  const [topLevelNodes, filterNodes] = await readNodeLists(values.tln, values.fn, io, context);
  const organizer = new PathwayOrganizer(new KeggRestService(new KeggRequester(io.transport)));
  const nodes = await organizer.loadFromKegg({ topLevelNodes, filterNodes }, context);

  await handleCliOutput(values.output, hierarchyNodesToJson(nodes), io, context);
  return 0;
}
