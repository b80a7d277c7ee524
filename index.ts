#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./src/config.js";
import { createServer, SERVER_NAME } from "./server.js";

async function main() {
  // Fail on a bad PAGERANK_* value before accepting any request
  const config = loadConfig();
  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} running on stdio (damping=${config.damping}, samples=${config.samples}, tolerance=${config.tolerance})`);
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
