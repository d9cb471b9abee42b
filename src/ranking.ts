/**
 * Ranking engine — BM25 with an exact-keyword bonus and a bounded fuzzy
 * fallback over keywords.
 *
 *   score(q, e) = Σ IDF(t) · (tf · (k1+1)) / (tf + k1 · (1 - b + b · |e|/avgdl))
 *
 * Raw scores are divided by the best raw score of the query, so the top hit
 * is always 1.0 and everything else is a fraction of it.
 */

import { distance } from "fastest-levenshtein";
import type { AgentEntry, RankingParams, ScoredResult } from "./types";
import { DEFAULT_RANKING } from "./types";
import { buildCorpusStats, compareNames, queryTerms } from "./terms";
import type { CorpusStats, EntryTermStats } from "./terms";

export function inverseDocumentFrequency(totalEntries: number, df: number): number {
  return Math.log((totalEntries - df + 0.5) / (df + 0.5) + 1);
}

export function bm25(
  corpus: CorpusStats,
  stats: EntryTermStats,
  term: string,
  params: RankingParams
): number {
  const tf = stats.term_frequencies.get(term) ?? 0;
  if (tf === 0) return 0;

  const { bm25_k1: k1, bm25_b: b } = params;
  const df = corpus.document_frequency.get(term) ?? 0;
  const idf = inverseDocumentFrequency(corpus.total_entries, df);

  const relativeLength = corpus.avg_length > 0 ? stats.length / corpus.avg_length : 0;
  const lengthNorm = 1 - b + b * relativeLength;
  return idf * ((tf * (k1 + 1)) / (tf + k1 * lengthNorm));
}

/**
 * Best fuzzy keyword contribution for a term nobody in the corpus contains.
 * Keywords are visited in sorted order so equal scores resolve the same way
 * every run.
 */
function fuzzyKeywordScore(
  corpus: CorpusStats,
  stats: EntryTermStats,
  term: string,
  params: RankingParams
): number {
  let best = 0;
  for (const keyword of [...stats.keywords].sort(compareNames)) {
    if (Math.abs(keyword.length - term.length) > params.fuzzy_max_edits) continue;
    if (distance(term, keyword) > params.fuzzy_max_edits) continue;
    best = Math.max(best, bm25(corpus, stats, keyword, params) * params.fuzzy_weight);
  }
  return best;
}

interface RawScore {
  entry: AgentEntry;
  raw: number;
  matched: string[];
}

/** Raw (unnormalized) score of every entry against the query terms. */
export function scoreEntries(
  corpus: CorpusStats,
  terms: readonly string[],
  params: RankingParams = DEFAULT_RANKING
): RawScore[] {
  const scores: RawScore[] = [];

  for (const stats of corpus.entries) {
    let raw = 0;
    const matched: string[] = [];

    for (const term of terms) {
      if (stats.term_frequencies.has(term)) {
        raw += bm25(corpus, stats, term, params);
        if (stats.keywords.has(term)) raw += params.keyword_bonus;
        matched.push(term);
        continue;
      }

      // Fuzzy only for terms with no exact hit anywhere in the corpus
      const exactSomewhere = (corpus.document_frequency.get(term) ?? 0) > 0;
      if (exactSomewhere || term.length < params.fuzzy_min_length) continue;

      const fuzzy = fuzzyKeywordScore(corpus, stats, term, params);
      if (fuzzy > 0) {
        raw += fuzzy;
        matched.push(term);
      }
    }

    scores.push({ entry: stats.entry, raw, matched });
  }

  return scores;
}

/**
 * Rank entries for a query: score, drop zeros, max-normalize, sort by
 * score descending then name ascending.
 */
export function rankEntries(
  entries: readonly AgentEntry[],
  query: string,
  params: RankingParams = DEFAULT_RANKING
): ScoredResult[] {
  const terms = queryTerms(query);
  if (terms.length === 0 || entries.length === 0) return [];

  const corpus = buildCorpusStats(entries);
  const raw = scoreEntries(corpus, terms, params).filter((s) => s.raw > 0);
  if (raw.length === 0) return [];

  const max = Math.max(...raw.map((s) => s.raw));

  return raw
    .map((s) => ({
      entry: s.entry,
      score: s.raw / max,
      matched_terms: s.matched,
    }))
    .sort((a, b) => b.score - a.score || compareNames(a.entry.name, b.entry.name));
}
