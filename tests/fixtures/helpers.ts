/**
 * Shared test helpers for agent-registry tests.
 *
 * Factories for entries and registries, a temp-directory content root,
 * a telemetry sink that records events, and an MCP client wired through
 * InMemoryTransport.
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { AgentStore } from "../../src/store";
import { registerTools } from "../../src/tools";
import { computeStats } from "../../src/registry-file";
import { REGISTRY_VERSION, singleRootConfig } from "../../src/types";
import type { AgentEntry, Registry, RegistryConfig } from "../../src/types";
import type { TelemetryData, TelemetryEvent, TelemetrySink } from "../../src/telemetry";

// ── Entry / Registry factories ───────────────────────────────────────

export function makeEntry(overrides: Partial<AgentEntry> = {}): AgentEntry {
  const name = overrides.name ?? "test-agent";
  return {
    name,
    path: `agents/${name}.md`,
    summary: "A test agent",
    keywords: [],
    token_estimate: 100,
    content_hash: "0123456789abcdef",
    ...overrides,
  };
}

export function makeRegistry(entries: AgentEntry[]): Registry {
  return { version: REGISTRY_VERSION, entries, stats: computeStats(entries) };
}

// ── Telemetry ────────────────────────────────────────────────────────

export interface RecordedEvent {
  event: TelemetryEvent;
  data: TelemetryData;
}

export function recordingTelemetry(): TelemetrySink & { events: RecordedEvent[] } {
  const events: RecordedEvent[] = [];
  return {
    events,
    track(event, data = {}) {
      events.push({ event, data });
    },
  };
}

// ── Temp content root ────────────────────────────────────────────────

export interface AgentRoot {
  root: string;
  config: RegistryConfig;
  cleanup: () => Promise<void>;
}

/** Create a temp root and write the given files (paths relative to it). */
export async function createAgentRoot(files: Record<string, string> = {}): Promise<AgentRoot> {
  const root = await mkdtemp(join(tmpdir(), "agent-registry-test-"));
  for (const [relPath, content] of Object.entries(files)) {
    const filePath = join(root, relPath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
  }
  return {
    root,
    config: singleRootConfig(root),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── MCP test client factory ──────────────────────────────────────────

export interface McpTestHarness {
  client: Client;
  store: AgentStore;
  mcpServer: McpServer;
  cleanup: () => Promise<void>;
}

/**
 * Connected Client ↔ McpServer pair linked via InMemoryTransport, with all
 * tools and resources registered against a store for the given config.
 */
export async function createMcpTestClient(config: RegistryConfig): Promise<McpTestHarness> {
  const store = new AgentStore({ config, telemetry: recordingTelemetry() });

  const mcpServer = new McpServer({
    name: "agent-registry-test",
    version: "0.0.1",
  });
  registerTools(mcpServer, store);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  // Connect server first, then client
  await mcpServer.server.connect(serverTransport);

  const client = new Client({ name: "test-client", version: "0.0.1" });
  await client.connect(clientTransport);

  return {
    client,
    store,
    mcpServer,
    cleanup: async () => {
      await client.close();
      await mcpServer.server.close();
    },
  };
}

function isTextContent(c: unknown): c is { type: "text"; text: string } {
  return (
    typeof c === "object" &&
    c !== null &&
    "type" in c &&
    c.type === "text" &&
    "text" in c &&
    typeof c.text === "string"
  );
}

/** Extract the text parts of a callTool result. */
export function getToolText(result: unknown): string {
  if (typeof result !== "object" || result === null || !("content" in result)) return "";
  const content: unknown = result.content;
  if (!Array.isArray(content)) return "";
  return content
    .filter(isTextContent)
    .map((c) => c.text)
    .join("\n");
}

export function isToolError(result: unknown): boolean {
  return typeof result === "object" && result !== null && "isError" in result && result.isError === true;
}
