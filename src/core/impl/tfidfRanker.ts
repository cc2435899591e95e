import type { Ranker, TermScoreInput } from "../ranker.js";

export function idf(docCount: number, df: number, smoothing: number): number {
  // classic smooth: log((N + s) / (df + s)) + 1
  return Math.log((docCount + smoothing) / (df + smoothing)) + 1;
}

export interface TfIdfRankerOptions {
  /** Smoothing constant for IDF. */
  idfSmoothing?: number;
  /** Divide by sqrt(doc length) so long documents do not win by volume. */
  normalizeLength?: boolean;
}

/**
 * tf * idf per matched term, optionally length-normalized.
 * Summed over terms this is the same as normalizing the document total.
 */
export class TfIdfRanker implements Ranker {
  private readonly smoothing: number;
  private readonly normalizeLength: boolean;

  constructor(options: TfIdfRankerOptions = {}) {
    this.smoothing = options.idfSmoothing ?? 1;
    this.normalizeLength = options.normalizeLength ?? true;
  }

  scoreTerm({ tf, df, docCount, docLength }: TermScoreInput): number {
    if (!docCount || tf <= 0) return 0;
    const score = tf * idf(docCount, df, this.smoothing);
    return this.normalizeLength && docLength > 0 ? score / Math.sqrt(docLength) : score;
  }
}
