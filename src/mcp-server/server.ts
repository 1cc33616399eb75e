/**
 * @fileoverview Main entry point for the MCP (Model Context Protocol) server.
 * This file orchestrates the server's lifecycle:
 * 1. Initializes the core `McpServer` instance with its identity and capabilities.
 * 2. Registers the KEGG tools.
 * 3. Connects the server to a stdio transport.
 *
 * @module src/mcp-server/server
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config, environment } from "../config/index.js";
import { BaseErrorCode } from "../types-global/errors.js";
import { ErrorHandler, logger, requestContextService } from "../utils/index.js";
import { KeggToolDependencies } from "./tools/keggGetEntryIds/logic.js";
import { registerKeggGetEntryIdsTool } from "./tools/keggGetEntryIds/index.js";
import { registerKeggPullEntriesTool } from "./tools/keggPullEntries/index.js";

/**
 * Creates the `McpServer` and registers every tool on it.
 *
 * @throws {McpError} If any tool registration fails.
 */
export async function createMcpServerInstance(
  dependencies: KeggToolDependencies = {},
): Promise<McpServer> {
  const context = requestContextService.createRequestContext({
    operation: "createMcpServerInstance",
  });
  logger.info("Initializing MCP server instance", context);

  requestContextService.configure({
    appName: config.mcpServerName,
    appVersion: config.mcpServerVersion,
    environment,
  });

  const server = new McpServer(
    { name: config.mcpServerName, version: config.mcpServerVersion },
    { capabilities: { logging: {}, tools: { listChanged: true } } },
  );

  // Keep tool registrations in alphabetical order.
  await registerKeggGetEntryIdsTool(server, dependencies);
  await registerKeggPullEntriesTool(server, dependencies);
  logger.info("Tools registered successfully", context);

  return server;
}

/**
 * Starts the server on stdin/stdout. Logs go to stderr, so the channel
 * carries protocol messages only.
 */
export async function initializeAndStartServer(): Promise<McpServer> {
  const context = requestContextService.createRequestContext({
    operation: "initializeAndStartServer",
  });
  logger.info("MCP Server initialization sequence started.", context);

  return ErrorHandler.tryCatch(
    async () => {
      const server = await createMcpServerInstance();
      await server.connect(new StdioServerTransport());
      logger.info("MCP Server connected over stdio.", context);
      return server;
    },
    {
      operation: "initializeAndStartServer",
      context,
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
      critical: true,
    },
  );
}
