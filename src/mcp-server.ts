#!/usr/bin/env node
/**
 * mcp-server.ts - MCP server entry point for healthdesk
 *
 * An MCP client spawns this process and talks JSON-RPC over stdio. The
 * server loads the configuration, builds one health agent and registers
 * the health tools against it (see src/tools/mcp).
 *
 * stdout carries the protocol, so everything this process logs goes to
 * stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createHealthAgent } from "./bootstrap";
import { loadConfig } from "./config";
import { ConfigError, describeError } from "./errors";
import { registerHealthTools } from "./tools/mcp";
import { flushTracing, initTracing } from "./tracing";

const stderrLogger = {
  log: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.error(...args),
  error: (...args: unknown[]) => console.error(...args),
};

async function main(): Promise<void> {
  const config = loadConfig();
  initTracing(process.env, stderrLogger);

  const server = new McpServer({
    name: "healthdesk",
    version: "0.1.0",
  });
  registerHealthTools(server, createHealthAgent(config, { logger: stderrLogger }));

  // Flush pending spans when the client closes the connection
  server.server.onclose = () => {
    flushTracing(stderrLogger).catch((error: unknown) => {
      console.error("[OTel] Error flushing spans:", error);
    });
  };

  await server.connect(new StdioServerTransport());
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("MCP server error:", describeError(error));
  }
  process.exit(1);
});
