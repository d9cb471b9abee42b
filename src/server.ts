/**
 * MCP Server for the agent registry
 *
 * Exposes 4 tools so an agent can find and load specialists lazily:
 *
 *   1. search_agents    - Ranked search over agent metadata
 *   2. get_agent        - Load one agent's full content
 *   3. list_agents      - Browse the catalog
 *   4. rebuild_registry - Regenerate the index from agent files
 *
 * The agent workflow:
 *   search_agents → pick a name → get_agent → follow its instructions
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { AgentStore } from "./store";
import { registerTools } from "./tools";
import { singleRootConfig } from "./types";
import { VERSION } from "./telemetry";

// ── Configuration ────────────────────────────────────────────────────

const root = process.env.AGENT_REGISTRY_ROOT || ".";
const config = singleRootConfig(root);

const store = new AgentStore({ config });

const server = new McpServer({
  name: "agent-registry",
  version: VERSION,
});

registerTools(server, store);

// ── Startup ──────────────────────────────────────────────────────────

async function main() {
  console.error(`[agent-registry] Serving registry ${config.registry_path}`);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[agent-registry] MCP server running on stdio");
}

main().catch((err) => {
  console.error("[agent-registry] Fatal error:", err);
  process.exit(1);
});
