import type { Ranker, TermScoreInput } from "../ranker.js";

export interface Bm25RankerOptions {
  k1?: number;
  b?: number;
}

/** Okapi BM25 with the non-negative (Lucene-style) IDF. */
export class Bm25Ranker implements Ranker {
  private readonly k1: number;
  private readonly b: number;

  constructor(options: Bm25RankerOptions = {}) {
    this.k1 = options.k1 ?? 1.2;
    this.b = options.b ?? 0.75;
  }

  scoreTerm({ tf, df, docCount, docLength, avgDocLength }: TermScoreInput): number {
    if (!docCount || tf <= 0) return 0;
    const idf = Math.log((docCount - df + 0.5) / (df + 0.5) + 1);
    const lengthRatio = avgDocLength > 0 ? docLength / avgDocLength : 1;
    const norm = tf + this.k1 * (1 - this.b + this.b * lengthRatio);
    return idf * ((tf * (this.k1 + 1)) / norm);
  }
}
