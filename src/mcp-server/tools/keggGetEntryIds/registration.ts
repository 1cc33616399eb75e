/**
 * @fileoverview Registration for the kegg_get_entry_ids MCP tool.
 * @module src/mcp-server/tools/keggGetEntryIds/registration
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
import {
  KeggGetEntryIdsInput,
  KeggGetEntryIdsInputSchema,
  keggGetEntryIdsLogic,
  KeggToolDependencies,
} from "./logic.js";

/**
 * Registers the kegg_get_entry_ids tool with the MCP server.
 * @param server - The McpServer instance.
 * @param dependencies - Passed through to the tool logic.
 */
export async function registerKeggGetEntryIdsTool(
  server: McpServer,
  dependencies: KeggToolDependencies = {},
): Promise<void> {
  const operation = "registerKeggGetEntryIdsTool";
  const toolName = "kegg_get_entry_ids";
  const toolDescription =
    "Gets KEGG entry IDs, either every ID of a database (KEGG 'list') or the IDs matching keywords or a molecular attribute (formula, exact mass, molecular weight) via KEGG 'find'. Returns a JSON object with the total count and up to maxResults entry IDs.";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.tool(
        toolName,
        toolDescription,
        KeggGetEntryIdsInputSchema.shape,
        async (
          input: KeggGetEntryIdsInput,
          mcpProvidedContext: unknown,
        ): Promise<CallToolResult> => {
          const richContext: RequestContext =
            requestContextService.createRequestContext({
              parentRequestId: context.requestId,
              operation: "keggGetEntryIdsToolHandler",
              mcpToolContext: mcpProvidedContext,
            });

          try {
            const result = await measureExecution(
              () => keggGetEntryIdsLogic(input, richContext, dependencies),
              { ...richContext, operationName: toolName, namespace: "mcp-tools" },
              input,
            );
            return {
              content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
              isError: false,
            };
          } catch (error) {
            const mcpError = ErrorHandler.handleError(error, {
              operation: "keggGetEntryIdsToolHandler",
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
