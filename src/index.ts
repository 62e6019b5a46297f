import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { consoleLogger } from "./logger.js";
import { registerTools } from "./mcp/tools.js";

async function main() {
  // ── Config and services ───────────────────────────────────────

  const config = loadConfig();
  const app = createApp(config, consoleLogger);

  // ── MCP server ────────────────────────────────────────────────

  const server = new McpServer({
    name: "vault-curator",
    version: "1.0.0",
  });
  registerTools(server, app);

  // ── Start ─────────────────────────────────────────────────────

  const transport = new StdioServerTransport();
  transport.onclose = () => {
    app.close().catch((err: unknown) => consoleLogger.error("Failed to close database pool", err));
  };
  await server.connect(transport);
  consoleLogger.info("vault-curator MCP server ready on stdio");
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
