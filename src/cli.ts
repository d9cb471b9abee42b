/**
 * agent-registry command line
 *
 * Usage:
 *   agent-registry search "react testing" [--page 2] [--page-size 5] [--json]
 *   agent-registry get react-expert
 *   agent-registry list [--json]
 *   agent-registry rebuild
 *
 * Every command accepts --root <dir> (default: $AGENT_REGISTRY_ROOT or .).
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { AgentStore, pageOffset } from "./store";
import { singleRootConfig } from "./types";
import type { ScoredResult } from "./types";
import { ExitCode, errorMessage, isRegistryError } from "./errors";
import { createTelemetry, VERSION } from "./telemetry";
import type { TelemetrySink } from "./telemetry";

export interface CliIO {
  stdout: (chunk: string) => void;
  stderr: (chunk: string) => void;
  env: Record<string, string | undefined>;
  telemetry?: TelemetrySink;
}

export function processIO(): CliIO {
  return {
    stdout: (chunk) => process.stdout.write(chunk),
    stderr: (chunk) => process.stderr.write(chunk),
    env: process.env,
  };
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function flatten(result: ScoredResult) {
  return {
    ...result.entry,
    score: Number(result.score.toFixed(4)),
    matched_terms: result.matched_terms,
  };
}

interface SearchFlags {
  page?: number;
  pageSize?: number;
  top?: number;
  json?: boolean;
}

export function createProgram(io: CliIO): Command {
  const program = new Command()
    .name("agent-registry")
    .description("Search and lazily load indexed agent definitions")
    .version(VERSION, "-v, --version", "Show version number")
    .option("--root <dir>", "Registry root (holds references/ and agents/)", io.env.AGENT_REGISTRY_ROOT || ".")
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
    })
    .exitOverride();

  const openStore = () => {
    const { root } = program.opts<{ root: string }>();
    return new AgentStore({
      config: singleRootConfig(root),
      telemetry: io.telemetry ?? createTelemetry({ env: io.env }),
    });
  };

  // ── search ──────────────────────────────────────────────────────

  program
    .command("search")
    .description("Rank agents against a natural-language query")
    .argument("<query...>", "query text")
    .option("--page <n>", "1-indexed page of results", positiveInt)
    .option("--page-size <n>", "results per page (default 10)", positiveInt)
    .option("--top <n>", "keep only the best n results", positiveInt)
    .option("--json", "machine-readable output")
    .action(async (words: string[], flags: SearchFlags) => {
      const query = words.join(" ");
      const options = { top_k: flags.top, page: flags.page, page_size: flags.pageSize };
      const results = await openStore().search(query, options);

      if (flags.json) {
        io.stdout(
          JSON.stringify(
            {
              query,
              page: flags.page ?? null,
              page_size: flags.pageSize ?? null,
              count: results.length,
              results: results.map(flatten),
            },
            null,
            2
          ) + "\n"
        );
        return;
      }

      if (results.length === 0) {
        io.stdout(`No agents matched "${query}".\n`);
        return;
      }

      const offset = pageOffset(options);
      for (const [i, r] of results.entries()) {
        io.stdout(`${offset + i + 1}. ${r.entry.name}  ${r.score.toFixed(2)}  ~${r.entry.token_estimate} tokens\n`);
        if (r.entry.summary) io.stdout(`   ${r.entry.summary}\n`);
      }
    });

  // ── get ─────────────────────────────────────────────────────────

  program
    .command("get")
    .description("Print an agent's full content")
    .argument("<name>", "exact name or an unambiguous part of it")
    .action(async (name: string) => {
      const { content } = await openStore().get(name);
      io.stdout(content.endsWith("\n") ? content : `${content}\n`);
    });

  // ── list ────────────────────────────────────────────────────────

  program
    .command("list")
    .description("List all indexed agents with metadata")
    .option("--json", "machine-readable output")
    .action(async (flags: { json?: boolean }) => {
      const { entries, stats } = await openStore().list();

      if (flags.json) {
        io.stdout(JSON.stringify({ entries, stats }, null, 2) + "\n");
        return;
      }

      for (const e of entries) {
        io.stdout(`${e.name}  ~${e.token_estimate} tokens  ${e.path}\n`);
        if (e.summary) io.stdout(`    ${e.summary}\n`);
        if (e.keywords.length > 0) io.stdout(`    keywords: ${e.keywords.join(", ")}\n`);
      }
      io.stdout(
        `\n${stats.total_agents} agents • ${stats.total_tokens} tokens • ~${stats.tokens_saved_vs_preload} saved vs preloading\n`
      );
    });

  // ── rebuild ─────────────────────────────────────────────────────

  program
    .command("rebuild")
    .description("Rescan agent files and regenerate the registry")
    .action(async () => {
      const registry = await openStore().rebuild();
      io.stdout(
        `Rebuilt registry: ${registry.stats.total_agents} agents, ${registry.stats.total_tokens} tokens ` +
          `(~${registry.stats.tokens_saved_vs_preload} saved vs preloading)\n`
      );
    });

  return program;
}

/** Run the CLI and return the process exit code instead of exiting. */
export async function runCli(argv: readonly string[], io: CliIO = processIO()): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return ExitCode.SUCCESS;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version also arrive here under exitOverride
      return err.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.MISUSE;
    }
    if (isRegistryError(err)) {
      io.stderr(`${err.format()}\n`);
      return err.exitCode;
    }
    if (err instanceof RangeError) {
      io.stderr(`${err.message}\n`);
      return ExitCode.MISUSE;
    }
    io.stderr(`Unexpected error: ${errorMessage(err)}\n`);
    return ExitCode.ERROR;
  }
}
