/**
 * @fileoverview Registration for the kegg_pull_entries MCP tool.
 * @module src/mcp-server/tools/keggPullEntries/registration
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { BaseErrorCode } from "../../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  measureExecution,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import { KeggToolDependencies } from "../keggGetEntryIds/logic.js";
import {
  KeggPullEntriesInput,
  KeggPullEntriesInputSchema,
  keggPullEntriesLogic,
} from "./logic.js";

/**
 * Registers the kegg_pull_entries tool with the MCP server.
 * @param server - The McpServer instance.
 * @param dependencies - Passed through to the tool logic.
 */
export async function registerKeggPullEntriesTool(
  server: McpServer,
  dependencies: KeggToolDependencies = {},
): Promise<void> {
  const operation = "registerKeggPullEntriesTool";
  const toolName = "kegg_pull_entries";
  const toolDescription =
    "Pulls KEGG entries by ID in batches of up to 10 per request, retrying timed-out requests. Saves entries to a directory or ZIP archive when 'output' is given, otherwise returns their text. Returns a JSON pull summary with successful, failed and timed-out entry IDs.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.tool(
        toolName,
        toolDescription,
        KeggPullEntriesInputSchema.shape,
        async (
          input: KeggPullEntriesInput,
          mcpProvidedContext: unknown,
        ): Promise<CallToolResult> => {
          const richContext: RequestContext =
            requestContextService.createRequestContext({
              parentRequestId: context.requestId,
              operation: "keggPullEntriesToolHandler",
              mcpToolContext: mcpProvidedContext,
            });

          try {
            const result = await measureExecution(
              () => keggPullEntriesLogic(input, richContext, dependencies),
              { ...richContext, operationName: toolName, namespace: "mcp-tools" },
              input,
            );
            return {
              content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
              isError: false,
            };
          } catch (error) {
            const mcpError = ErrorHandler.handleError(error, {
              operation: "keggPullEntriesToolHandler",
              context: richContext,
              input,
              errorCode: BaseErrorCode.INTERNAL_ERROR,
            });

            return {
              content: [
                {
                  type: "text",
                  text: JSON.stringify({
                    error: {
                      code: mcpError.code,
                      message: mcpError.message,
                      details: mcpError.details,
                    },
                  }),
                },
              ],
              isError: true,
            };
          }
        },
      );
      logger.notice(`Tool '${toolName}' registered.`, context);
    },
    {
      operation,
      context,
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
      critical: true,
    },
  );
}
