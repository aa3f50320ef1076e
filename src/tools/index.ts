import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ConnectorManager } from "../connectors/manager.js";
import { RUN_SCRIPT_TOOL, createRunScriptToolHandler, runScriptSchema } from "./run-script.js";

/**
 * Register all tool handlers with the MCP server
 */
export function registerTools(server: McpServer, manager: ConnectorManager): void {
  const sourceIds = manager.getSourceIds();

  if (sourceIds.length === 0) {
    throw new Error("No database sources configured");
  }

  server.tool(
    RUN_SCRIPT_TOOL,
    `Run a multi-statement SQL script one statement at a time and return per-statement results. ` +
      `Available sources: ${sourceIds.join(", ")}`,
    runScriptSchema,
    createRunScriptToolHandler(manager)
  );
}
