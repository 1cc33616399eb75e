/**
 * @fileoverview Input and output plumbing shared by the CLI commands:
 * comma-separated lists, standard input, option parsing and writing a
 * response to stdout, a file, or a file inside a ZIP archive.
 * @module src/cli/io
 */

import AdmZip from "adm-zip";
import { existsSync } from "fs";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { KeggTransport } from "../services/KEGG/core/keggCoreApiClient.js";
import { BaseErrorCode, McpError } from "../types-global/errors.js";
import { logger, RequestContext } from "../utils/index.js";

/** Process boundaries of a command, replaceable in tests. */
export interface CliIo {
  write(content: string | Buffer): void;
  readStdin(): Promise<string>;
  /** Replaces the HTTP client used for KEGG requests. */
  transport?: KeggTransport;
}

export const processIo: CliIo = {
  write(content) {
    process.stdout.write(content);
  },
  async readStdin() {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf-8");
  },
};

export const validationError = (message: string): McpError =>
  new McpError(BaseErrorCode.VALIDATION_ERROR, message);

/**
 * Splits "a,b,,c" into ["a", "b", "c"], warning about blanks.
 * @throws {McpError} When no items remain.
 */
export function splitCommaSeparatedList(listString: string, context: RequestContext): string[] {
  const items = listString.split(",").map((item) => item.trim());
  const nonBlank = items.filter((item) => item !== "");
  if (nonBlank.length < items.length) {
    logger.warning(
      `Blank items detected in the comma separated list: "${listString}". Removing blanks...`,
      context,
    );
  }
  if (nonBlank.length === 0) {
    throw validationError(`Empty list provided: "${listString}"`);
  }
  return nonBlank;
}

/**
 * A comma-separated list, or one item per line from stdin when `input` is "-".
 */
export async function readListInput(
  input: string,
  io: CliIo,
  context: RequestContext,
): Promise<string[]> {
  if (input !== "-") {
    return splitCommaSeparatedList(input, context);
  }
  const items = (await io.readStdin())
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
  if (items.length === 0) {
    throw validationError("Empty list provided from standard input");
  }
  return items;
}

/**
 * Parses a command-line option value with `schema`.
 * @throws {McpError} `VALIDATION_ERROR` naming the option.
 */
export function parseOptionValue<T>(
  schema: z.ZodType<T>,
  value: string | undefined,
  optionName: string,
): T | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0]?.message ?? "invalid value";
    throw validationError(`Invalid value for --${optionName}: "${value}" (${issue})`);
  }
  return parsed.data;
}

export const positiveInteger = z.coerce.number().int().positive();
export const positiveNumber = z.coerce.number().positive();
export const nonNegativeNumber = z.coerce.number().nonnegative();
export const finiteNumber = z.coerce.number().finite();

/**
 * Saves `content` to `output`, or writes it to stdout when `output` is
 * undefined. `archive.zip:name.txt` stores the file `name.txt` in the
 * archive, appending when it exists.
 */
export async function handleCliOutput(
  output: string | undefined,
  content: string | Buffer,
  io: CliIo,
  context: RequestContext,
): Promise<void> {
  if (output === undefined) {
    if (typeof content !== "string") {
      logger.warning("Printing binary output...", context);
      io.write(content);
      return;
    }
    io.write(content.endsWith("\n") ? content : `${content}\n`);
    return;
  }

  const zipMarker = output.indexOf(".zip:");
  if (zipMarker !== -1) {
    const zipFile = output.slice(0, zipMarker + ".zip".length);
    const fileName = output.slice(zipMarker + ".zip:".length);
    const zip = existsSync(zipFile) ? new AdmZip(zipFile) : new AdmZip();
    zip.addFile(fileName, typeof content === "string" ? Buffer.from(content, "utf-8") : content);
    await mkdir(path.dirname(path.resolve(zipFile)), { recursive: true });
    await writeFile(zipFile, zip.toBuffer());
    return;
  }

  await mkdir(path.dirname(path.resolve(output)), { recursive: true });
  await writeFile(output, content);
}
