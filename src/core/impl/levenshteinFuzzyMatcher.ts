import type { FuzzyMatch, FuzzyMatcher } from "../fuzzy.js";
import type { TermDictionary } from "../invertedIndex.js";
import type { Term } from "../types.js";

/**
 * Levenshtein distance between `a` and `b`, or `max + 1` once it is certain to
 * exceed `max`. Uses two rows; a row whose minimum is already above `max`
 * ends the computation since later rows can only grow.
 */
export function boundedEditDistance(a: string, b: string, max: number): number {
  if (Math.abs(a.length - b.length) > max) return max + 1;
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = new Array<number>(b.length + 1);
  let cur = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j++) prev[j] = j;

  for (let i = 1; i <= a.length; i++) {
    cur[0] = i;
    let rowMin = i;
    const ca = a.charCodeAt(i - 1);
    for (let j = 1; j <= b.length; j++) {
      const cost = ca === b.charCodeAt(j - 1) ? 0 : 1;
      const v = Math.min((prev[j] ?? 0) + 1, (cur[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost);
      cur[j] = v;
      if (v < rowMin) rowMin = v;
    }
    if (rowMin > max) return max + 1;
    [prev, cur] = [cur, prev];
  }

  const d = prev[b.length] ?? max + 1;
  return d > max ? max + 1 : d;
}

export interface LevenshteinFuzzyMatcherOptions {
  /** candidates must share this many leading characters with the query term */
  prefixLength?: number;
}

/**
 * Scans the term dictionary with a bounded edit distance.
 * No distance index is kept; the length filter rejects most candidates
 * without running the DP.
 */
export class LevenshteinFuzzyMatcher implements FuzzyMatcher {
  private readonly prefixLength: number;

  constructor(options: LevenshteinFuzzyMatcherOptions = {}) {
    this.prefixLength = options.prefixLength ?? 0;
  }

  expand(term: Term, maxDistance: number, dictionary: TermDictionary): FuzzyMatch[] {
    if (maxDistance <= 0) {
      return dictionary.hasTerm(term) ? [{ term, distance: 0 }] : [];
    }

    const prefix = term.slice(0, this.prefixLength);
    const matches: FuzzyMatch[] = [];

    for (const candidate of dictionary.terms()) {
      if (Math.abs(candidate.length - term.length) > maxDistance) continue;
      if (prefix && !candidate.startsWith(prefix)) continue;

      const distance = boundedEditDistance(term, candidate, maxDistance);
      if (distance <= maxDistance) matches.push({ term: candidate, distance });
    }

    matches.sort((a, b) => a.distance - b.distance || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0));
    return matches;
  }
}
