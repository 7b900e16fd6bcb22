#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { registerTools } from "./mcp/tools.js";

// ── Start ───────────────────────────────────────────────────────

async function main() {
  const config = loadConfig();
  const app = createApp(config);

  const server = new McpServer({
    name: "mdcapture",
    version: "1.0.0",
  });
  registerTools(server, app.service, app.syncStates, { concurrency: config.concurrency });

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
