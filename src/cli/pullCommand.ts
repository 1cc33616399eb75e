/**
 * @fileoverview `kegg-pull pull`: pulls every entry of a database, or the
 * entries of given IDs, and writes the run summary.
 * @module src/cli/pullCommand
 */

import { parseArgs } from "util";
import { z } from "zod";
import { config } from "../config/index.js";
import { KeggEntryField, KEGG_ENTRY_FIELD_LIST } from "../services/KEGG/core/keggConstants.js";
import { KeggRequester } from "../services/KEGG/core/keggRequester.js";
import { KeggRestService } from "../services/KEGG/core/keggRestService.js";
import { EntryIdsGetter } from "../services/KEGG/entryIds.js";
import { UnsuccessfulThreshold } from "../services/KEGG/pull/multiplePull.js";
import { pull, pullToMemory, PullOptions } from "../services/KEGG/pull/pull.js";
import { PullResult } from "../services/KEGG/pull/pullResult.js";
import { logger, requestContextService } from "../utils/index.js";
import {
  CliIo,
  finiteNumber,
  nonNegativeNumber,
  parseOptionValue,
  positiveInteger,
  positiveNumber,
  readListInput,
  validationError,
} from "./io.js";

export const PULL_USAGE = `Usage:
    kegg-pull pull database <database-name> [options]
    kegg-pull pull entry-ids <entry-ids> [options]

Options:
    --output=<output>             Directory for the pulled entries, or a path ending in ".zip". Defaults to the current directory.
    --print                       Print the entries instead of saving them.
    --sep=<print-separator>       With --print, separate entries with this string instead of heading each with its ID.
    --force-single-entry          Request one entry at a time. Set automatically for the "brite" database.
    --multi-process               Pull batches concurrently.
    --n-workers=<n-workers>       Number of concurrent workers. Defaults to the available parallelism.
    --batch-size=<batch-size>     Entry IDs per request, 1 to 10. Defaults to 10.
    --entry-field=<entry-field>   Field to pull instead of the full entry (aaseq, ntseq, mol, kcf, image, conf, kgml, json).
    --n-tries=<n-tries>           Attempts per request before it is marked timed out. Defaults to ${config.kegg.nTries}.
    --time-out=<time-out>         Seconds to wait for a response. Defaults to ${config.kegg.timeoutSeconds}.
    --sleep-time=<sleep-time>     Seconds to wait after a timeout before retrying. Defaults to ${config.kegg.sleepSeconds}.
    --ut=<ratio>                  Abort once failed plus timed-out IDs exceed this fraction of all IDs (between 0.0 and 1.0).
    --max-unsuccessful=<count>    Abort once failed plus timed-out IDs exceed this count.
    --results=<path>              Where to write the run summary. Defaults to "${config.kegg.pullResultsPath}".

<entry-ids> is a comma separated list, or "-" to read one entry ID per line from standard input.`;

const entryFieldSchema = z.enum(KEGG_ENTRY_FIELD_LIST);
const nonNegativeInteger = z.coerce.number().int().nonnegative();

function printEntries(
  result: PullResult,
  entries: Map<string, string | Buffer>,
  separator: string | undefined,
  io: CliIo,
): void {
  const texts: Array<[string, string]> = [];
  for (const entryId of result.successfulEntryIds) {
    const entry = entries.get(entryId);
    if (entry !== undefined) {
      texts.push([entryId, typeof entry === "string" ? entry : entry.toString("base64")]);
    }
  }
  if (separator !== undefined) {
    io.write(`${texts.map(([, text]) => text).join(`\n${separator}\n`)}\n`);
    return;
  }
  for (const [entryId, text] of texts) {
    io.write(`${entryId}\n${text}\n`);
  }
}

export async function runPullCommand(argv: string[], io: CliIo): Promise<number> {
  const context = requestContextService.createRequestContext({ operation: "cli.pull" });
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      help: { type: "boolean", short: "h" },
      output: { type: "string" },
      print: { type: "boolean" },
      sep: { type: "string" },
      "force-single-entry": { type: "boolean" },
      "multi-process": { type: "boolean" },
      "n-workers": { type: "string" },
      "batch-size": { type: "string" },
      "entry-field": { type: "string" },
      "n-tries": { type: "string" },
      "time-out": { type: "string" },
      "sleep-time": { type: "string" },
      ut: { type: "string" },
      "max-unsuccessful": { type: "string" },
      results: { type: "string" },
    },
  });

  if (values.help) {
    io.write(`${PULL_USAGE}\n`);
    return 0;
  }

  const [source, argument, ...extra] = positionals;
  if ((source !== "database" && source !== "entry-ids") || argument === undefined || extra.length > 0) {
    throw validationError(`Invalid arguments for "pull".\n${PULL_USAGE}`);
  }
  if (values.ut !== undefined && values["max-unsuccessful"] !== undefined) {
    throw validationError("Only one of --ut and --max-unsuccessful may be given");
  }

  const ratio = parseOptionValue(finiteNumber, values.ut, "ut");
  const maxUnsuccessful = parseOptionValue(
    nonNegativeInteger,
    values["max-unsuccessful"],
    "max-unsuccessful",
  );
  let unsuccessfulThreshold: UnsuccessfulThreshold | undefined;
  if (ratio !== undefined) {
    unsuccessfulThreshold = { kind: "ratio", value: ratio };
  } else if (maxUnsuccessful !== undefined) {
    unsuccessfulThreshold = { kind: "count", value: maxUnsuccessful };
  }

  const entryField: KeggEntryField | undefined = parseOptionValue(
    entryFieldSchema,
    values["entry-field"],
    "entry-field",
  );
  const nTries = parseOptionValue(positiveInteger, values["n-tries"], "n-tries");
  const timeout = parseOptionValue(positiveNumber, values["time-out"], "time-out");
  const sleepTime = parseOptionValue(nonNegativeNumber, values["sleep-time"], "sleep-time");
  let forceSingleEntry = values["force-single-entry"] ?? false;

  let entryIds: string[];
  if (source === "database") {
    if (argument === "brite") {
      forceSingleEntry = true;
    }
    const rest = new KeggRestService(
      new KeggRequester(io.transport, { nTries, timeoutSeconds: timeout, sleepSeconds: sleepTime }),
    );
    entryIds = await new EntryIdsGetter(rest).fromDatabase(argument, context);
  } else {
    entryIds = await readListInput(argument, io, context);
  }

  const options: PullOptions = {
    batchSize: parseOptionValue(positiveInteger, values["batch-size"], "batch-size"),
    forceSingleEntry,
    multiProcess: values["multi-process"] ?? false,
    nWorkers: parseOptionValue(positiveInteger, values["n-workers"], "n-workers"),
    entryField,
    nTries,
    timeout,
    sleepTime,
    unsuccessfulThreshold,
    resultsPath: values.results ?? config.kegg.pullResultsPath,
    transport: io.transport,
    context,
  };

  if (values.print) {
    const { result, entries } = await pullToMemory(entryIds, options);
    printEntries(result, entries, values.sep, io);
    return 0;
  }

  if (values.sep !== undefined) {
    logger.warning("--sep is only used together with --print", context);
  }
  await pull(entryIds, values.output ?? ".", options);
  return 0;
}
