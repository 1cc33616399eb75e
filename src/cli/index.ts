#!/usr/bin/env node
/**
 * @fileoverview Executable entry point of `kegg-pull`.
 * @module src/cli/index
 */

import { runCli } from "./runCli.js";

const exitCode = await runCli(process.argv.slice(2));
if (exitCode !== null) {
  process.exitCode = exitCode;
}
