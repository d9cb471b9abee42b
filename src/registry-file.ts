/**
 * Index store — typed access to the registry JSON file.
 *
 * The file is always read whole and written whole. Saves go to a temporary
 * file beside the target and are renamed over it, so a reader sees either
 * the previous registry or the new one, never a torn write.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, isAbsolute, join } from "node:path";
import { z } from "zod";
import type { AgentEntry, Registry, RegistryStats } from "./types";
import { REGISTRY_VERSION } from "./types";
import { RegistryError, errnoCode, errorMessage } from "./errors";

const REBUILD_HINT = "Run `agent-registry rebuild` to regenerate the index.";
const SAVE_HINT = "Nothing was written. Fix the entries being saved and retry.";

// ── Schema ───────────────────────────────────────────────────────────
//
// Strict objects: an unknown or missing field is a corrupt index, not
// something to default silently.

const nonNegativeInt = z.number().int().nonnegative();

const entrySchema = z
  .object({
    name: z.string().min(1),
    path: z
      .string()
      .min(1)
      .refine((p) => !isAbsolute(p), "path must be relative to the content root"),
    summary: z.string(),
    keywords: z.array(z.string()),
    token_estimate: nonNegativeInt,
    content_hash: z.string(),
  })
  .strict();

const registrySchema = z
  .object({
    version: z.number().int(),
    entries: z.array(entrySchema),
    stats: z
      .object({
        total_agents: nonNegativeInt,
        total_tokens: nonNegativeInt,
        tokens_saved_vs_preload: nonNegativeInt,
      })
      .strict(),
  })
  .strict();

// ── Stats ────────────────────────────────────────────────────────────

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Tokens an entry costs when it sits in the index instead of the full file */
export function indexTokens(entry: AgentEntry): number {
  return estimateTokens(`${entry.name} ${entry.summary} ${entry.keywords.join(" ")}`);
}

export function computeStats(entries: readonly AgentEntry[]): RegistryStats {
  let total_tokens = 0;
  let index_tokens = 0;
  for (const entry of entries) {
    total_tokens += entry.token_estimate;
    index_tokens += indexTokens(entry);
  }
  return {
    total_agents: entries.length,
    total_tokens,
    tokens_saved_vs_preload: Math.max(0, total_tokens - index_tokens),
  };
}

export function withStats(registry: Registry): Registry {
  return { ...registry, stats: computeStats(registry.entries) };
}

export function emptyRegistry(): Registry {
  return { version: REGISTRY_VERSION, entries: [], stats: computeStats([]) };
}

export function serializeRegistry(registry: Registry): string {
  return JSON.stringify(registry, null, 2) + "\n";
}

// ── Validation ───────────────────────────────────────────────────────

export function parseRegistry(raw: string, source: string): Registry {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new RegistryError("CorruptIndex", `Registry ${source} is not valid JSON: ${errorMessage(err)}`, {
      hint: REBUILD_HINT,
      cause: err,
    });
  }

  return validateRegistry(data, source);
}

/**
 * Schema, version, unique-name and stats checks shared by load and save.
 * A registry that fails here is never written and never served.
 */
export function validateRegistry(data: unknown, source: string, hint: string = REBUILD_HINT): Registry {
  const parsed = registrySchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new RegistryError("CorruptIndex", `Registry ${source} does not match the schema: ${issues}`, {
      hint,
    });
  }

  const registry: Registry = parsed.data;

  if (registry.version !== REGISTRY_VERSION) {
    throw new RegistryError(
      "CorruptIndex",
      `Registry ${source} has unsupported version ${registry.version} (expected ${REGISTRY_VERSION})`,
      { hint }
    );
  }

  const seen = new Set<string>();
  for (const entry of registry.entries) {
    const key = entry.name.toLowerCase();
    if (seen.has(key)) {
      throw new RegistryError("CorruptIndex", `Registry ${source} lists "${entry.name}" more than once`, {
        hint,
      });
    }
    seen.add(key);
  }

  const expected = computeStats(registry.entries);
  if (
    registry.stats.total_agents !== expected.total_agents ||
    registry.stats.total_tokens !== expected.total_tokens
  ) {
    throw new RegistryError(
      "CorruptIndex",
      `Registry ${source} stats disagree with its entries ` +
        `(${registry.stats.total_agents} agents / ${registry.stats.total_tokens} tokens recorded, ` +
        `${expected.total_agents} / ${expected.total_tokens} actual)`,
      { hint }
    );
  }

  return registry;
}

// ── Load / Save ──────────────────────────────────────────────────────

export async function loadRegistry(registryPath: string): Promise<Registry> {
  let raw: string;
  try {
    raw = await readFile(registryPath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new RegistryError("NotFound", `Registry not found at ${registryPath}`, {
        hint: REBUILD_HINT,
        cause: err,
      });
    }
    throw new RegistryError("IOFailure", `Could not read registry ${registryPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return parseRegistry(raw, registryPath);
}

let tmpCounter = 0;

/**
 * Write the complete registry atomically. Stats are recomputed and the
 * result validated first, so the file on disk always loads back.
 */
export async function saveRegistry(registryPath: string, registry: Registry): Promise<Registry> {
  const finalized = validateRegistry(withStats(registry), registryPath, SAVE_HINT);
  const dir = dirname(registryPath);
  const tmpPath = join(dir, `.${basename(registryPath)}.${process.pid}.${++tmpCounter}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tmpPath, serializeRegistry(finalized), "utf8");
    await rename(tmpPath, registryPath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw new RegistryError("IOFailure", `Could not save registry ${registryPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return finalized;
}
