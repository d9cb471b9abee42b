/**
 * Agent indexer
 *
 * Turns agent markdown files into registry entries: frontmatter for name,
 * description and keywords, first paragraph as a fallback summary, a size
 * estimate and a content hash. Full content is never copied into the entry.
 */

import { createHash } from "node:crypto";
import { readFile, stat } from "node:fs/promises";
import { basename, extname, relative, sep } from "node:path";
import { glob } from "glob";
import type { AgentEntry, RegistryConfig } from "./types";
import { RegistryError, errnoCode, errorMessage } from "./errors";
import { estimateTokens } from "./registry-file";
import { normalizeKeywords, topTerms } from "./terms";

const DERIVED_KEYWORD_COUNT = 8;
const BATCH_SIZE = 50;

// ── Frontmatter extraction ──────────────────────────────────────────

export interface Frontmatter {
  name?: string;
  description?: string;
  keywords?: string[];
  tags?: string[];
  [key: string]: string | string[] | undefined;
}

function splitList(value: string): string[] {
  return value
    .replace(/[\[\]]/g, "")
    .split(",")
    .map((s) => s.trim().replace(/^['"]|['"]$/g, ""))
    .filter(Boolean);
}

export function extractFrontmatter(markdown: string): {
  frontmatter: Frontmatter;
  body: string;
} {
  const text = markdown.replace(/\r\n/g, "\n");
  const fmMatch = text.match(/^---\n([\s\S]*?)\n---(?:\n([\s\S]*))?$/);
  if (!fmMatch) return { frontmatter: {}, body: text };

  const fm: Frontmatter = {};
  for (const line of fmMatch[1].split("\n")) {
    const kv = line.match(/^([\w-]+):\s*(.+)$/);
    if (!kv) continue;
    const [, key, value] = kv;
    if (key === "keywords" || key === "tags" || value.startsWith("[")) {
      fm[key] = splitList(value);
    } else {
      fm[key] = value.trim().replace(/^['"]|['"]$/g, "");
    }
  }

  return { frontmatter: fm, body: fmMatch[2] ?? "" };
}

function stringField(fm: Frontmatter, key: string): string | undefined {
  const value = fm[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function listField(fm: Frontmatter, key: string): string[] {
  const value = fm[key];
  if (Array.isArray(value)) return value;
  return typeof value === "string" ? splitList(value) : [];
}

// ── Summary ─────────────────────────────────────────────────────────

/** First non-heading paragraph of the body, whitespace collapsed. */
export function firstParagraph(body: string): string {
  const paragraph: string[] = [];
  for (const line of body.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      if (paragraph.length > 0) break;
      continue;
    }
    if (/^#{1,6}\s/.test(trimmed)) {
      if (paragraph.length > 0) break;
      continue;
    }
    paragraph.push(trimmed);
  }
  return paragraph.join(" ");
}

function truncate(text: string, maxLen: number): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length > maxLen ? collapsed.slice(0, maxLen).trimEnd() + "…" : collapsed;
}

// ── Content hashing ─────────────────────────────────────────────────
//
// Short and stable across runs: unchanged files keep their hash, so a
// second rebuild over the same tree writes identical entries.

export function computeContentHash(content: string): string {
  return createHash("sha256").update(content).digest("hex").slice(0, 16);
}

// ── Entry construction ──────────────────────────────────────────────

export interface EntrySource {
  path: string; // relative to the content root
  raw: string; // full file text
  name?: string; // overrides frontmatter / filename
}

/**
 * Build a complete entry from a file's text. Exported so an ingestion step
 * can hand candidates to AgentStore.ingest without going through rebuild.
 */
export function buildEntry(source: EntrySource, summaryLength: number = 200): AgentEntry {
  const { frontmatter, body } = extractFrontmatter(source.raw);

  const name =
    source.name ||
    stringField(frontmatter, "name") ||
    basename(source.path, extname(source.path));

  const summary = truncate(stringField(frontmatter, "description") || firstParagraph(body), summaryLength);

  const declared = normalizeKeywords([...listField(frontmatter, "keywords"), ...listField(frontmatter, "tags")]);
  const keywords = declared.length > 0 ? declared : topTerms(body, DERIVED_KEYWORD_COUNT).sort();

  return {
    name,
    path: source.path,
    summary,
    keywords,
    token_estimate: estimateTokens(source.raw),
    content_hash: computeContentHash(source.raw),
  };
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

export async function indexAgentFile(filePath: string, config: RegistryConfig): Promise<AgentEntry> {
  const raw = await readFile(filePath, "utf8");
  return buildEntry({ path: toPosix(relative(config.root, filePath)), raw }, config.summary_length);
}

// ── Scan the agents directory ───────────────────────────────────────

async function assertDirectory(dir: string): Promise<void> {
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new RegistryError("NotFound", `Agents path ${dir} is not a directory`);
    }
  } catch (err) {
    if (err instanceof RegistryError) throw err;
    if (errnoCode(err) === "ENOENT") {
      throw new RegistryError("NotFound", `Agents directory not found: ${dir}`, {
        hint: "Create it and add one markdown file per agent.",
        cause: err,
      });
    }
    throw new RegistryError("IOFailure", `Could not read ${dir}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Scan every agent file and build fresh entries, in path order.
 * Duplicate names (case-insensitive) keep the first file and skip the rest.
 */
export async function indexAgents(config: RegistryConfig): Promise<AgentEntry[]> {
  await assertDirectory(config.agents_dir);

  const files = (await glob("**/*.md", { cwd: config.agents_dir, absolute: true, nodir: true })).sort();
  console.error(`[agent-registry] Found ${files.length} agent files in ${config.agents_dir}`);

  const indexed: AgentEntry[] = [];
  for (let i = 0; i < files.length; i += BATCH_SIZE) {
    const batch = files.slice(i, i + BATCH_SIZE);
    const results = await Promise.all(
      batch.map((f) =>
        indexAgentFile(f, config).catch((err: unknown) => {
          console.error(`[agent-registry] Failed to index ${f}: ${errorMessage(err)}`);
          return null;
        })
      )
    );
    for (const entry of results) {
      if (entry) indexed.push(entry);
    }
  }

  const seen = new Set<string>();
  const entries: AgentEntry[] = [];
  for (const entry of indexed) {
    const key = entry.name.toLowerCase();
    if (seen.has(key)) {
      console.error(`[agent-registry] Skipping ${entry.path}: duplicate agent name "${entry.name}"`);
      continue;
    }
    seen.add(key);
    entries.push(entry);
  }

  console.error(`[agent-registry] Indexed ${entries.length} agents`);
  return entries;
}
