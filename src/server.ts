import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { ConnectorManager } from "./connectors/manager.js";
import { registerTools } from "./tools/index.js";
import type { SourceConfig } from "./types/config.js";

// Server info
export const SERVER_NAME = "sqlrunner MCP Server";

/**
 * Create an MCP server exposing the batch runner for the given connections
 */
export function createServer(manager: ConnectorManager, version: string): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version,
  });

  registerTools(server, manager);

  return server;
}

/**
 * Connect to every configured source and serve MCP over stdio until SIGINT
 */
export async function startMcpServer(sources: SourceConfig[], version: string): Promise<void> {
  const manager = new ConnectorManager();

  console.error(`Connecting to ${sources.length} database source(s)...`);
  await manager.connectWithSources(sources);

  const server = createServer(manager, version);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("MCP server running on stdio");

  const shutdown = async (): Promise<void> => {
    console.error("Shutting down...");
    await transport.close();
    await manager.disconnect();
  };

  // Close connections on SIGINT
  process.on("SIGINT", () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("Error during shutdown:", error);
        process.exit(1);
      });
  });
}
