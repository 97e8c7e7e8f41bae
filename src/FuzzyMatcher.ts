import { MatchStrategy } from "./interfaces/IReconciliation";

export const DEFAULT_MIN_SCORE = 80;

export type MatchInput<T> = {
  name: string;
  value: T;
};

export type ScoredMatch<T> = {
  value: T;
  index: number;
  score: number;
  strategy: MatchStrategy;
};

function longestCommonSubsequence(a: string, b: string): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Normalized indel similarity, 0..100. Two strings of total length T sharing a
 * longest common subsequence of length M score round(200 * M / T).
 */
export function ratio(a: string, b: string): number {
  if (!a || !b) return 0;
  return Math.round((200 * longestCommonSubsequence(a, b)) / (a.length + b.length));
}

/**
 * Best `ratio` of the shorter string against each same-length window of the
 * longer one.
 */
export function partialRatio(a: string, b: string): number {
  if (!a || !b) return 0;
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === longer.length) return ratio(shorter, longer);

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const score = ratio(shorter, longer.substring(start, start + shorter.length));
    if (score > best) best = score;
    if (best === 100) break;
  }
  return best;
}

function sortedTokens(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .split(" ")
    .filter((token) => token.length > 0)
    .sort()
    .join(" ");
}

/** `ratio` after sorting the words of each side, so word order does not count. */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortedTokens(a), sortedTokens(b));
}

/** Effective score of one pair: the best of the three strategies. */
export function score(query: string, candidate: string): { score: number; strategy: MatchStrategy } {
  const exact = ratio(query, candidate);
  if (exact === 100) return { score: 100, strategy: "Exact" };

  const partial = partialRatio(query, candidate);
  const tokenSort = tokenSortRatio(query, candidate);

  if (exact >= partial && exact >= tokenSort) return { score: exact, strategy: "Exact" };
  if (partial >= tokenSort) return { score: partial, strategy: "Partial" };
  return { score: tokenSort, strategy: "TokenSort" };
}

/**
 * Picks the candidate whose name is closest to `query`. Ties go to the
 * earliest candidate. Returns null when nothing reaches `minScore`.
 */
export function match<T>(
  query: string,
  candidates: readonly MatchInput<T>[],
  minScore: number = DEFAULT_MIN_SCORE
): ScoredMatch<T> | null {
  if (!query) return null;

  let best: ScoredMatch<T> | null = null;

  for (let index = 0; index < candidates.length; index++) {
    const candidate = candidates[index];
    if (!candidate.name) continue;

    const scored = score(query, candidate.name);
    if (!best || scored.score > best.score) {
      best = { value: candidate.value, index, ...scored };
      if (best.score === 100) break;
    }
  }

  if (!best || best.score < minScore) return null;
  return best;
}
