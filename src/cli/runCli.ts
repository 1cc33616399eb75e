/**
 * @fileoverview Dispatches `kegg-pull` sub-commands and maps errors to exit
 * codes. A pull that ran exits 0 whatever its per-entry outcomes; invalid
 * arguments and failed single requests exit 1.
 * @module src/cli/runCli
 */

import { config } from "../config/index.js";
import { initializeAndStartServer } from "../mcp-server/server.js";
import { McpError } from "../types-global/errors.js";
import { ErrorHandler, requestContextService } from "../utils/index.js";
import { ENTRY_IDS_USAGE, runEntryIdsCommand } from "./entryIdsCommand.js";
import { CliIo, processIo } from "./io.js";
import { LINK_TO_DICT_USAGE, runLinkToDictCommand } from "./linkToDictCommand.js";
import {
  PATHWAY_ORGANIZER_USAGE,
  runPathwayOrganizerCommand,
} from "./pathwayOrganizerCommand.js";
import { PULL_USAGE, runPullCommand } from "./pullCommand.js";
import { REST_USAGE, runRestCommand } from "./restCommand.js";

export const USAGE = `Usage:
    kegg-pull -h | --help
    kegg-pull -v | --version
    kegg-pull pull ...          Pull, separate and save KEGG entries.
    kegg-pull entry-ids ...     Get entry IDs of a database or search results.
    kegg-pull link-to-dict ...  Map entry IDs to the IDs of related entries.
    kegg-pull pathway-organizer ...
                                Flatten the pathway Brite hierarchy.
    kegg-pull rest ...          Run one KEGG REST operation.
    kegg-pull mcp               Serve the KEGG tools over MCP on stdio.

${PULL_USAGE}

${ENTRY_IDS_USAGE}

${LINK_TO_DICT_USAGE}

${PATHWAY_ORGANIZER_USAGE}

${REST_USAGE}`;

/**
 * Runs one invocation. Resolves with the exit code, or null when a
 * long-running server was started.
 */
export async function runCli(
  argv: string[],
  io: CliIo = processIo,
  writeError: (message: string) => void = (message) => {
    process.stderr.write(`${message}\n`);
  },
): Promise<number | null> {
  const [command, ...rest] = argv;
  const context = requestContextService.createRequestContext({
    operation: "runCli",
    command,
  });

  try {
    switch (command) {
      case "pull":
        return await runPullCommand(rest, io);
      case "entry-ids":
        return await runEntryIdsCommand(rest, io);
      case "link-to-dict":
        return await runLinkToDictCommand(rest, io);
      case "pathway-organizer":
        return await runPathwayOrganizerCommand(rest, io);
      case "rest":
        return await runRestCommand(rest, io);
      case "mcp":
        await initializeAndStartServer();
        return null;
      case "-v":
      case "--version":
        io.write(`${config.pkg.version}\n`);
        return 0;
      case "-h":
      case "--help":
        io.write(`${USAGE}\n`);
        return 0;
      default:
        writeError(command === undefined ? USAGE : `Unknown command "${command}".\n${USAGE}`);
        return 1;
    }
  } catch (error) {
    const mcpError =
      error instanceof McpError
        ? error
        : ErrorHandler.handleError(error, { operation: "runCli", context });
    writeError(`Error: ${mcpError.message}`);
    return 1;
  }
}
