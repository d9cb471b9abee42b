/**
 * Term model — tokenization and corpus statistics for BM25.
 *
 * No stemming: "testing" and "tests" are different terms. Statistics are
 * rebuilt from the entries on every query; there is no persisted inverted
 * index. Entry counts are expected in the low thousands.
 */

import type { AgentEntry } from "./types";

// Articles, conjunctions and a handful of function words that carry no
// signal in agent summaries.
const STOPWORDS = new Set([
  "a",
  "an",
  "the",
  "and",
  "or",
  "but",
  "nor",
  "so",
  "yet",
  "of",
  "to",
  "in",
  "on",
  "at",
  "by",
  "for",
  "with",
  "from",
  "as",
  "is",
  "are",
  "be",
  "it",
  "its",
  "this",
  "that",
]);

// ── Tokenization ─────────────────────────────────────────────────────

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((w) => w.length >= 2 && !STOPWORDS.has(w));
}

/** Query terms: tokenized, deduplicated, first-occurrence order. */
export function queryTerms(query: string): string[] {
  return [...new Set(tokenize(query))];
}

/**
 * Normalize free-form keywords ("React Native", "UI/UX") into the flat,
 * sorted term set stored on an entry.
 */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  const terms = new Set<string>();
  for (const keyword of keywords) {
    for (const t of tokenize(keyword)) terms.add(t);
  }
  return [...terms].sort();
}

/** Indexable bag for one entry: name, then summary, then keywords. */
export function entryTerms(entry: AgentEntry): string[] {
  return [
    ...tokenize(entry.name),
    ...tokenize(entry.summary),
    ...entry.keywords.flatMap((k) => tokenize(k)),
  ];
}

// ── Corpus statistics ────────────────────────────────────────────────

export interface EntryTermStats {
  entry: AgentEntry;
  term_frequencies: Map<string, number>;
  length: number; // |bag|
  keywords: Set<string>; // normalized keyword terms
}

export interface CorpusStats {
  total_entries: number; // N
  avg_length: number; // avgdl
  document_frequency: Map<string, number>; // df(t)
  entries: EntryTermStats[]; // same order as the input
}

export function buildCorpusStats(entries: readonly AgentEntry[]): CorpusStats {
  const document_frequency = new Map<string, number>();
  const stats: EntryTermStats[] = [];
  let totalLength = 0;

  for (const entry of entries) {
    const bag = entryTerms(entry);
    const term_frequencies = new Map<string, number>();
    for (const term of bag) {
      term_frequencies.set(term, (term_frequencies.get(term) ?? 0) + 1);
    }
    for (const term of term_frequencies.keys()) {
      document_frequency.set(term, (document_frequency.get(term) ?? 0) + 1);
    }

    totalLength += bag.length;
    stats.push({
      entry,
      term_frequencies,
      length: bag.length,
      keywords: new Set(normalizeKeywords(entry.keywords)),
    });
  }

  return {
    total_entries: entries.length,
    avg_length: entries.length > 0 ? totalLength / entries.length : 0,
    document_frequency,
    entries: stats,
  };
}

/** Term frequency ranking used to derive keywords for files that declare none. */
export function topTerms(text: string, limit: number): string[] {
  const counts = new Map<string, number>();
  for (const term of tokenize(text)) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || compareNames(a[0], b[0]))
    .slice(0, limit)
    .map(([term]) => term);
}

/** Code-unit ordering, independent of the host locale. */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
