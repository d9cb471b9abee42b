/**
 * Shared MCP tool & resource registration
 *
 * Kept out of server.ts so integration tests can wire a McpServer and
 * InMemoryTransport without any real I/O.
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { pageOffset } from "./store";
import type { AgentStore } from "./store";
import { isRegistryError } from "./errors";

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function text(body: string): ToolResult {
  return { content: [{ type: "text" as const, text: body }] };
}

/** Registry errors are expected outcomes: report them, don't throw. */
async function guarded(run: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await run();
  } catch (err) {
    if (isRegistryError(err)) {
      return { ...text(err.format()), isError: true };
    }
    throw err;
  }
}

/**
 * Register all agent-registry tools and resources on the given MCP server.
 *
 * Tools:
 *   1. search_agents    — Ranked search over agent metadata
 *   2. get_agent        — Full content of one agent, loaded on demand
 *   3. list_agents      — Catalog with token statistics
 *   4. rebuild_registry — Rescan agent files and rewrite the index
 *
 * Resources:
 *   - registry-stats (registry://stats) — JSON registry statistics
 */
export function registerTools(server: McpServer, store: AgentStore): void {
  // ── Tool 1: search_agents ──────────────────────────────────────────

  server.tool(
    "search_agents",
    "Find the agents most relevant to a task. Returns names, summaries and relevance scores without loading agent content — call get_agent with a name to load one.",
    {
      query: z.string().min(1).describe("What the agent should be good at"),
      page: z.number().int().min(1).optional().describe("1-indexed result page"),
      page_size: z.number().int().min(1).max(50).optional().describe("Results per page (default 10)"),
      limit: z.number().int().min(1).max(100).optional().describe("Cap on total ranked results"),
    },
    async ({ query, page, page_size, limit }) =>
      guarded(async () => {
        const options = { top_k: limit, page, page_size };
        const results = await store.search(query, options);
        const offset = pageOffset(options);

        if (results.length === 0) {
          return text(`No agents matched "${query}". Try broader terms or use list_agents to browse.`);
        }

        const formatted = results
          .map(
            (r, i) =>
              `${offset + i + 1}. ${r.entry.name} (score ${r.score.toFixed(2)}, ~${r.entry.token_estimate} tokens)\n   ${r.entry.summary}\n   matched: ${r.matched_terms.join(", ")}`
          )
          .join("\n\n");

        return text(
          `Agents for "${query}" (${results.length} shown):\n\n${formatted}\n\nUse get_agent(name) to load an agent's full instructions.`
        );
      })
  );

  // ── Tool 2: get_agent ──────────────────────────────────────────────

  server.tool(
    "get_agent",
    "Load the full content of one agent. Accepts the exact name or an unambiguous part of it.",
    {
      name: z.string().min(1).describe("Agent name (from search_agents or list_agents)"),
    },
    async ({ name }) =>
      guarded(async () => {
        const { entry, content } = await store.get(name);
        return text(`━━━ ${entry.name} (${entry.path}) ━━━\n\n${content}`);
      })
  );

  // ── Tool 3: list_agents ────────────────────────────────────────────

  server.tool(
    "list_agents",
    "List every indexed agent with its summary and size estimate.",
    async () =>
      guarded(async () => {
        const { entries, stats } = await store.list();
        const lines = entries.map(
          (e) => `• ${e.name} (~${e.token_estimate} tokens)\n  ${e.summary}${e.keywords.length ? `\n  keywords: ${e.keywords.join(", ")}` : ""}`
        );
        return text(
          `${stats.total_agents} agents, ${stats.total_tokens} tokens total, ~${stats.tokens_saved_vs_preload} tokens saved by lazy loading:\n\n${lines.join("\n\n")}`
        );
      })
  );

  // ── Tool 4: rebuild_registry ───────────────────────────────────────

  server.tool(
    "rebuild_registry",
    "Rescan the agents directory and regenerate the registry from scratch.",
    async () =>
      guarded(async () => {
        const registry = await store.rebuild();
        return text(
          `Registry rebuilt: ${registry.stats.total_agents} agents, ${registry.stats.total_tokens} tokens.`
        );
      })
  );

  // ── Resources: expose registry stats ───────────────────────────────

  server.resource("registry-stats", "registry://stats", async (uri) => {
    const stats = await store.stats();
    return {
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(stats, null, 2),
        },
      ],
    };
  });
}
