import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "@/app/mcp";
import { resetSearchEngine } from "@/lib/spec-loader";

// stdout carries the protocol; everything else goes to stderr.
async function main(): Promise<void> {
  const server = createMcpServer();
  const transport = new StdioServerTransport();

  const shutdown = (): void => {
    resetSearchEngine();
    server.close().catch((error: unknown) => {
      console.error("[server] failed to close MCP server", error);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.connect(transport);
  console.error("[server] MCP server listening on stdio");
}

main().catch((error: unknown) => {
  console.error("[server] fatal error", error);
  process.exitCode = 1;
});
