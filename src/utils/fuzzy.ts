import { tokenize } from './text.js';

export function jaccardScore(a: Set<string>, b: Set<string>): number {
  if (!a.size || !b.size) return 0;
  let intersection = 0;
  a.forEach((token) => {
    if (b.has(token)) intersection += 1;
  });
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/** 1 - normalized Levenshtein distance. */
export function fuzzySimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  if (a === b) return 1;
  const aLen = a.length;
  const bLen = b.length;
  let prev = Array.from({ length: bLen + 1 }, (_, j) => j);
  for (let i = 1; i <= aLen; i += 1) {
    const curr = [i];
    for (let j = 1; j <= bLen; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return 1 - prev[bLen] / Math.max(aLen, bLen);
}

/**
 * Best similarity between `name` and any run of consecutive tokens in `text`
 * whose length is within one token of the name's. Names shorter than five
 * characters only count on an exact match.
 */
export function windowScore(textTokens: string[], nameTokens: string[]): number {
  if (!textTokens.length || !nameTokens.length) return 0;
  const target = nameTokens.join(' ');
  if (target.length < 3) return 0;
  let best = 0;
  const sizes = [nameTokens.length - 1, nameTokens.length, nameTokens.length + 1].filter(
    (n) => n >= 1 && n <= textTokens.length,
  );
  for (const size of sizes) {
    for (let start = 0; start + size <= textTokens.length; start += 1) {
      const window = textTokens.slice(start, start + size).join(' ');
      const raw = fuzzySimilarity(window, target);
      const score = target.length < 5 && raw < 1 ? 0 : raw;
      if (score > best) best = score;
      if (best === 1) return 1;
    }
  }
  return best;
}

/** Tokens of four or more characters tolerate one typo in five. */
export function tokensMatch(a: string, b: string): boolean {
  if (a === b) return true;
  return Math.min(a.length, b.length) >= 4 && fuzzySimilarity(a, b) >= 0.8;
}

/**
 * Share of the query's tokens found among the name's tokens. Single-letter
 * tokens (titles such as "د") are ignored, so a first name alone fully matches
 * every name that carries it.
 */
export function containmentScore(queryTokens: string[], nameTokens: string[]): number {
  const query = queryTokens.filter((t) => t.length > 1);
  if (!query.length || !nameTokens.length) return 0;
  const found = query.filter((q) => nameTokens.some((n) => tokensMatch(q, n))).length;
  return found / query.length;
}

export interface FuzzyCandidate {
  id: string;
  names: string[];
}

export interface FuzzyMatch {
  id: string;
  score: number;
}

export interface RankOptions {
  threshold: number;
  /** Candidates scoring within this distance of the best are reported as ambiguous. */
  ambiguityGap?: number;
  /** The text is an isolated name: also score by token containment. */
  isolatedName?: boolean;
}

function scoreName(textTokens: string[], name: string, isolated: boolean): number {
  const nameTokens = tokenize(name);
  const window = windowScore(textTokens, nameTokens);
  const overlap = jaccardScore(new Set(textTokens), new Set(nameTokens));
  const contained = isolated ? containmentScore(textTokens, nameTokens) : 0;
  return Math.max(window, overlap, contained);
}

/** Ranks candidates by their best-matching name and keeps the top group above threshold. */
export function rankCandidates(
  text: string,
  candidates: Iterable<FuzzyCandidate>,
  options: RankOptions,
): FuzzyMatch[] {
  const textTokens = tokenize(text);
  const gap = options.ambiguityGap ?? 0.1;
  const scored: FuzzyMatch[] = [];
  for (const candidate of candidates) {
    let score = 0;
    for (const name of candidate.names) {
      score = Math.max(score, scoreName(textTokens, name, options.isolatedName ?? false));
    }
    if (score >= options.threshold) scored.push({ id: candidate.id, score });
  }
  scored.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
  if (!scored.length) return scored;
  const best = scored[0].score;
  return scored.filter((m) => best - m.score <= gap);
}
