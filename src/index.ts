#!/usr/bin/env node
/**
 * Kanboard Insights MCP Server
 *
 * Task listings, workload and urgency analysis, and historical trend
 * analytics over a Kanboard instance, exposed as MCP tools.
 *
 * Tools:
 *   - kanboard_overview: Projects with columns, swimlanes, members, task counts
 *   - kanboard_tasks: Filtered, sorted, size-bounded task listing
 *   - kanboard_priorities: Workload, urgent items, bottlenecks, recommendations
 *   - kanboard_analytics: Completion, cycle time, velocity, aging, burndown, health
 *
 * Resources:
 *   - kanboard://projects/overview: Overview of active projects
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getConfig } from "./config.js";
import { createKanboardClient } from "./kanboard.js";
import { log } from "./logger.js";
import type { ContextProvider, ToolContext } from "./tool-helpers.js";
import { register as registerBoardTools } from "./tools-board.js";
import { register as registerAnalyticsTools } from "./tools-analytics.js";
import { register as registerResources } from "./tools-resources.js";

const VERSION = "0.1.0";

const server = new McpServer({
  name: "kanboard-insights",
  version: VERSION,
});

// Credentials are checked on the first call, so the server can start
// (and list its tools) before Kanboard is configured.
let context: ToolContext | null = null;

const getContext: ContextProvider = async () => {
  if (context) return context;
  const config = await getConfig();
  context = {
    source: createKanboardClient(config.kanboard),
    thresholds: config.thresholds,
  };
  log("info", "Kanboard client configured", { url: config.kanboard.url });
  return context;
};

registerBoardTools(server, getContext);
registerAnalyticsTools(server, getContext);
registerResources(server, getContext);

const ALL_TOOLS = [
  "kanboard_overview", "kanboard_tasks", "kanboard_priorities", "kanboard_analytics",
];

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Kanboard Insights MCP Server v${VERSION} running on stdio`);
  console.error(`Tools: ${ALL_TOOLS.join(", ")}`);
}

process.on("SIGINT", async () => {
  console.error("Shutting down Kanboard Insights MCP server...");
  await server.close();
  process.exit(0);
});

main().catch((error) => {
  console.error("Fatal error in Kanboard Insights MCP server:", error);
  process.exit(1);
});
