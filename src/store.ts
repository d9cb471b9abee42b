/**
 * Agent Store — query service over the registry file.
 *
 * Every operation loads the registry fresh, works on that value, and (for
 * rebuild/ingest) commits it with one atomic save. Nothing stays open
 * between calls.
 */

import type {
  AgentEntry,
  RankingParams,
  Registry,
  RegistryConfig,
  RegistryStats,
  ScoredResult,
  SearchOptions,
} from "./types";
import { DEFAULT_PAGE_SIZE, DEFAULT_RANKING, REGISTRY_VERSION } from "./types";
import { rankEntries } from "./ranking";
import { loadContent, resolveEntry } from "./content";
import { indexAgents } from "./indexer";
import { computeStats, emptyRegistry, loadRegistry, saveRegistry } from "./registry-file";
import { isRegistryError } from "./errors";
import { createTelemetry } from "./telemetry";
import type { TelemetrySink } from "./telemetry";

function assertPositiveInt(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Apply top_k, then pagination. Pagination kicks in when either page or
 * page_size is given; a page past the end is an empty list.
 */
export function paginate<T>(ranked: readonly T[], options: SearchOptions = {}): T[] {
  assertPositiveInt("top_k", options.top_k);
  assertPositiveInt("page", options.page);
  assertPositiveInt("page_size", options.page_size);

  const limited = options.top_k !== undefined ? ranked.slice(0, options.top_k) : [...ranked];
  if (options.page === undefined && options.page_size === undefined) return limited;

  const page = options.page ?? 1;
  const size = options.page_size ?? DEFAULT_PAGE_SIZE;
  const start = (page - 1) * size;
  return limited.slice(start, start + size);
}

/** Zero-based rank of the first item on the requested page. */
export function pageOffset(options: SearchOptions = {}): number {
  if (options.page === undefined && options.page_size === undefined) return 0;
  return ((options.page ?? 1) - 1) * (options.page_size ?? DEFAULT_PAGE_SIZE);
}

export interface AgentStoreOptions {
  config: RegistryConfig;
  telemetry?: TelemetrySink;
  ranking?: Partial<RankingParams>;
}

export class AgentStore {
  readonly config: RegistryConfig;
  private telemetry: TelemetrySink;
  private ranking: RankingParams;

  constructor(options: AgentStoreOptions) {
    this.config = options.config;
    this.telemetry = options.telemetry ?? createTelemetry();
    this.ranking = { ...DEFAULT_RANKING, ...options.ranking };
  }

  setRanking(params: Partial<RankingParams>): void {
    this.ranking = { ...this.ranking, ...params };
  }

  getRanking(): RankingParams {
    return { ...this.ranking };
  }

  load(): Promise<Registry> {
    return loadRegistry(this.config.registry_path);
  }

  // ── Search ──────────────────────────────────────────────────────

  /**
   * Rank a registry value against a query. Term statistics are derived once
   * for the whole call. Reports only count, timing and top score.
   */
  searchRegistry(registry: Registry, query: string, options: SearchOptions = {}): ScoredResult[] {
    const started = performance.now();
    const results = paginate(rankEntries(registry.entries, query, this.ranking), options);

    this.telemetry.track("search", {
      results: results.length,
      elapsed_ms: Math.round(performance.now() - started),
      top_score: results.length > 0 ? Number(results[0].score.toFixed(3)) : 0,
    });

    return results;
  }

  async search(query: string, options: SearchOptions = {}): Promise<ScoredResult[]> {
    const registry = await this.load();
    return this.searchRegistry(registry, query, options);
  }

  // ── Catalog ─────────────────────────────────────────────────────

  async list(): Promise<{ entries: AgentEntry[]; stats: RegistryStats }> {
    const registry = await this.load();
    this.telemetry.track("list", { count: registry.entries.length });
    return { entries: registry.entries, stats: registry.stats };
  }

  async stats(): Promise<RegistryStats> {
    const registry = await this.load();
    return registry.stats;
  }

  // ── Lazy content ────────────────────────────────────────────────

  async get(name: string): Promise<{ entry: AgentEntry; content: string }> {
    const registry = await this.load();
    try {
      const entry = resolveEntry(registry.entries, name);
      const content = await loadContent(this.config.root, entry);
      this.telemetry.track("get", { found: true, tokens: entry.token_estimate });
      return { entry, content };
    } catch (err) {
      if (isRegistryError(err)) this.telemetry.track("get", { found: false });
      throw err;
    }
  }

  // ── Writes ──────────────────────────────────────────────────────

  /** Rescan the agents directory and replace the registry wholesale. */
  async rebuild(): Promise<Registry> {
    const entries = await indexAgents(this.config);
    const saved = await saveRegistry(this.config.registry_path, {
      version: REGISTRY_VERSION,
      entries,
      stats: computeStats(entries),
    });
    this.telemetry.track("rebuild", { count: saved.stats.total_agents });
    return saved;
  }

  /**
   * Merge candidate entries from an ingestion step. An entry whose name
   * matches an existing one (case-insensitive) replaces it whole; the rest
   * are appended in the order given.
   */
  async ingest(candidates: readonly AgentEntry[]): Promise<Registry> {
    let registry: Registry;
    try {
      registry = await this.load();
    } catch (err) {
      if (!isRegistryError(err) || err.kind !== "NotFound") throw err;
      registry = emptyRegistry();
    }

    const entries = [...registry.entries];
    const position = new Map(entries.map((e, i) => [e.name.toLowerCase(), i]));

    for (const candidate of candidates) {
      const key = candidate.name.toLowerCase();
      const existing = position.get(key);
      if (existing === undefined) {
        position.set(key, entries.length);
        entries.push(candidate);
      } else {
        entries[existing] = candidate;
      }
    }

    const saved = await saveRegistry(this.config.registry_path, { ...registry, entries });
    this.telemetry.track("ingest", { count: candidates.length, total: saved.stats.total_agents });
    return saved;
  }
}
