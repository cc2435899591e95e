import type { TermDictionary } from "./invertedIndex.js";
import type { Term } from "./types.js";

export interface FuzzyMatch {
  term: Term;
  /** Levenshtein distance to the query term */
  distance: number;
}

/**
 * Finds dictionary terms within an edit distance of a query term.
 *
 * `expand(t, 0)` is exactly `[t]` when `t` is in the dictionary, else empty,
 * and `expand(t, k)` is always a subset of `expand(t, k + 1)`.
 */
export interface FuzzyMatcher {
  expand(term: Term, maxDistance: number, dictionary: TermDictionary): FuzzyMatch[];
}
