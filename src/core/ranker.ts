export interface TermScoreInput {
  /** (weighted) occurrences of the term or phrase in the document */
  tf: number;
  /** documents containing the term or phrase */
  df: number;
  docCount: number;
  /** document length in tokens, over the searched fields */
  docLength: number;
  avgDocLength: number;
}

/**
 * Scoring strategy.
 *
 * A document's score is the sum of `scoreTerm` over every term, expansion and
 * phrase that matched it. Implementations must be pure so ranking stays
 * deterministic.
 */
export interface Ranker {
  scoreTerm(input: TermScoreInput): number;
}
