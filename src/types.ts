/**
 * agent-registry type definitions
 *
 * Models a lightweight index of agent documents: the registry file holds
 * metadata only, full agent content stays on disk until someone asks for it.
 */

import { join } from "node:path";

// ── Persisted registry ──────────────────────────────────────────────

export const REGISTRY_VERSION = 1;

/**
 * Metadata for one indexed agent. Never carries the agent body.
 *
 * content_hash: short fingerprint of the raw file, used to spot stale
 *   entries after the backing file changes. Not meant to be collision-proof.
 */
export interface AgentEntry {
  name: string; // unique, compared case-insensitively
  path: string; // relative to the content root, POSIX separators
  summary: string;
  keywords: string[]; // normalized lowercase terms
  token_estimate: number;
  content_hash: string;
}

export interface RegistryStats {
  total_agents: number;
  total_tokens: number;
  tokens_saved_vs_preload: number;
}

export interface Registry {
  version: number;
  entries: AgentEntry[];
  stats: RegistryStats;
}

// ── Search result ───────────────────────────────────────────────────

export interface ScoredResult {
  entry: AgentEntry;
  score: number; // raw score divided by the best raw score of the query
  matched_terms: string[];
}

export interface SearchOptions {
  top_k?: number;
  page?: number;
  page_size?: number;
}

export const DEFAULT_PAGE_SIZE = 10;

// ── Ranking configuration ───────────────────────────────────────────

/**
 * BM25 + keyword tuning parameters.
 *
 * The fuzzy knobs are heuristics for tolerating typos in agent keywords,
 * not a recall booster. Tune them here rather than in the scorer.
 */
export interface RankingParams {
  /** TF saturation. Standard range 1.2-2.0. */
  bm25_k1: number;

  /** Length normalization. 0 = none, 1 = full. */
  bm25_b: number;

  /** Flat bonus per query term that equals one of the entry's keywords. */
  keyword_bonus: number;

  /** Multiplier applied to the BM25 of a fuzzily matched keyword (0-1). */
  fuzzy_weight: number;

  /** Maximum Levenshtein distance accepted for a fuzzy keyword match. */
  fuzzy_max_edits: number;

  /** Query terms shorter than this never fuzzy-match. */
  fuzzy_min_length: number;
}

export const DEFAULT_RANKING: RankingParams = {
  bm25_k1: 1.5,
  bm25_b: 0.75,
  keyword_bonus: 2.0,
  fuzzy_weight: 0.5,
  fuzzy_max_edits: 1,
  fuzzy_min_length: 4,
};

// ── Paths ───────────────────────────────────────────────────────────

/**
 * Where the registry and the agent files live.
 *
 * root is the content root: every AgentEntry.path resolves against it.
 */
export interface RegistryConfig {
  root: string;
  registry_path: string;
  agents_dir: string;
  summary_length: number;
}

/** Convenience: the standard layout under a single root */
export function singleRootConfig(root: string): RegistryConfig {
  return {
    root,
    registry_path: join(root, "references", "registry.json"),
    agents_dir: join(root, "agents"),
    summary_length: 200,
  };
}
