/**
 * @fileoverview Barrel file for the keggGetEntryIds tool.
 * @module src/mcp-server/tools/keggGetEntryIds/index
 */

export { registerKeggGetEntryIdsTool } from "./registration.js";
