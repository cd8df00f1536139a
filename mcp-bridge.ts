#!/usr/bin/env tsx
/**
 * MCP Bridge Server
 *
 * Stdio MCP server that exposes the kbridge knowledge base as tools.
 * Every tool call is forwarded to a running `kb server` over HTTP.
 * stdout carries the protocol, so diagnostics go to stderr.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { extractErrorMessage } from "./src/lib/bridge/index.ts";
import { getConfig } from "./src/lib/get_config.ts";
import { createApiClient } from "./src/lib/kb-cli/api_client.ts";
import { callTool, TOOLS } from "./src/lib/mcp/tools.ts";

async function main() {
  const config = await getConfig();
  const client = createApiClient(config.api_base);
  console.error(`[MCP Bridge] Starting, forwarding to: ${client.baseUrl}`);

  // Initial reachability check; tools still register so the agent sees them
  const status = await client.get("/api/kb/status");
  if (status.error !== undefined) {
    console.error(`[MCP Bridge] WARNING: ${status.error}`);
  }

  const server = new Server(
    { name: "kbridge", version: "0.1.0" },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS.map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = await callTool(client, name, args);
    if (result.isError) {
      console.error(`[MCP Bridge] Tool call failed: ${name}`);
    }
    return result;
  });

  // Graceful shutdown handlers
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      server
        .close()
        .catch((error: unknown) => console.error(`[MCP Bridge] Close failed: ${extractErrorMessage(error)}`))
        .finally(() => process.exit(0));
    });
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("[MCP Bridge] Server started and ready for connections");
}

main().catch((error: unknown) => {
  console.error(`[MCP Bridge] Fatal error: ${extractErrorMessage(error)}`);
  process.exit(1);
});
