import { ageInDays, type MemoryEntry, type RankOptions, type ScoredMemory } from '@insights/shared';
import { DEFAULT_CANDIDATE_LIMIT, type MemoryLedger } from './ledger.js';

const TOKEN_PATTERN = /[a-z0-9_]+/g;
const MIN_TOKEN_LENGTH = 3;
const PHRASE_BONUS = 0.25;
const RECENCY_WEIGHT = 0.10;
const RECENCY_SCALE_DAYS = 30;

export const DEFAULT_RANK_K = 5;
export const DEFAULT_MIN_SCORE = 0.15;

export function tokenize(text: string): Set<string> {
  const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return new Set(tokens.filter(t => t.length >= MIN_TOKEN_LENGTH));
}

/**
 * Fraction of distinct query tokens present in the document, plus a bonus
 * when the whole query appears verbatim. 0 when the query has no tokens.
 */
export function lexicalScore(query: string, document: string): number {
  const phrase = query.trim().toLowerCase();
  const queryTokens = tokenize(phrase);
  if (queryTokens.size === 0) return 0;

  const doc = document.toLowerCase();
  const docTokens = tokenize(doc);
  let overlap = 0;
  for (const token of queryTokens) {
    if (docTokens.has(token)) overlap++;
  }

  let score = overlap / queryTokens.size;
  if (doc.includes(phrase)) score += PHRASE_BONUS;
  return score;
}

export function recencyBonus(createdAt: string, now: Date): number {
  return RECENCY_WEIGHT / (1 + ageInDays(createdAt, now) / RECENCY_SCALE_DAYS);
}

/**
 * Score candidates (expected newest first) and keep the best `k`.
 * Only the lexical score is gated by `minScore`; recency is added after.
 */
export function rankCandidates(
  query: string,
  candidates: readonly MemoryEntry[],
  options: { k: number; minScore: number; now: Date },
): ScoredMemory[] {
  const scored: ScoredMemory[] = [];
  for (const entry of candidates) {
    const lexical = lexicalScore(query, entry.text);
    if (lexical < options.minScore) continue;
    scored.push({
      id: entry.id,
      text: entry.text,
      createdAt: entry.createdAt,
      lexicalScore: lexical,
      score: lexical + recencyBonus(entry.createdAt, options.now),
    });
  }

  // Array.prototype.sort is stable, so equal scores keep newest-first order.
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, Math.max(0, Math.floor(options.k)));
}

export interface RankerDefaults {
  k: number;
  minScore: number;
  candidateLimit: number;
}

export class RelevanceRanker {
  private defaults: RankerDefaults;

  constructor(
    private ledger: MemoryLedger,
    defaults: Partial<RankerDefaults> = {},
  ) {
    this.defaults = {
      k: defaults.k ?? DEFAULT_RANK_K,
      minScore: defaults.minScore ?? DEFAULT_MIN_SCORE,
      candidateLimit: defaults.candidateLimit ?? DEFAULT_CANDIDATE_LIMIT,
    };
  }

  rank(ownerId: number, query: string, options: RankOptions = {}): ScoredMemory[] {
    if (!query.trim()) return [];

    const candidates = this.ledger.fetchRecentCandidates(
      ownerId,
      options.candidateLimit ?? this.defaults.candidateLimit,
    );
    return rankCandidates(query, candidates, {
      k: options.k ?? this.defaults.k,
      minScore: options.minScore ?? this.defaults.minScore,
      now: options.now ?? new Date(),
    });
  }
}
