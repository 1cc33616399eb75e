/**
 * @fileoverview Barrel file for the keggPullEntries tool.
 * @module src/mcp-server/tools/keggPullEntries/index
 */

export { registerKeggPullEntriesTool } from "./registration.js";
