import { type Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Start the MCP stdio transport. Stdout carries protocol frames only; all
 * logging goes to stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 * @returns Promise resolving once the server is connected over stdio.
 */
export async function startStdioTransport(createServer: () => Server) {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
