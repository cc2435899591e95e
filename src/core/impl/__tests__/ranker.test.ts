import { describe, expect, it } from "vitest";
import { Bm25Ranker } from "../bm25Ranker.js";
import { TfIdfRanker, idf } from "../tfidfRanker.js";

const base = { tf: 1, df: 1, docCount: 1, docLength: 1, avgDocLength: 1 };

describe("TfIdfRanker", () => {
  it("multiplies tf by the smoothed idf and normalizes by length", () => {
    const input = { ...base, tf: 2, docCount: 3, docLength: 4 };
    expect(new TfIdfRanker().scoreTerm(input)).toBeCloseTo(1 + Math.log(2));
    expect(new TfIdfRanker({ normalizeLength: false }).scoreTerm(input)).toBeCloseTo(2 * (1 + Math.log(2)));
  });

  it("scores nothing without occurrences or documents", () => {
    const ranker = new TfIdfRanker();
    expect(ranker.scoreTerm({ ...base, tf: 0 })).toBe(0);
    expect(ranker.scoreTerm({ ...base, docCount: 0 })).toBe(0);
  });

  it("weights rare terms higher", () => {
    expect(idf(10, 1, 1)).toBeGreaterThan(idf(10, 5, 1));
    expect(idf(10, 10, 1)).toBe(1);
  });
});

describe("Bm25Ranker", () => {
  it("matches the closed form for an average-length document", () => {
    // idf = ln((N - df + 0.5) / (df + 0.5) + 1), tf part = 1 at tf = 1
    expect(new Bm25Ranker().scoreTerm(base)).toBeCloseTo(Math.log(4 / 3));
  });

  it("saturates with term frequency", () => {
    const ranker = new Bm25Ranker();
    const input = { ...base, docCount: 10, docLength: 5, avgDocLength: 5 };
    const once = ranker.scoreTerm({ ...input, tf: 1 });
    const many = ranker.scoreTerm({ ...input, tf: 100 });
    expect(many).toBeGreaterThan(once);
    expect(many).toBeLessThan(once * 2.2);
  });

  it("prefers shorter documents", () => {
    const ranker = new Bm25Ranker();
    const input = { ...base, docCount: 10, avgDocLength: 10 };
    expect(ranker.scoreTerm({ ...input, docLength: 5 })).toBeGreaterThan(ranker.scoreTerm({ ...input, docLength: 20 }));
  });

  it("ignores length when b is 0", () => {
    const ranker = new Bm25Ranker({ b: 0 });
    const input = { ...base, docCount: 10, avgDocLength: 10 };
    expect(ranker.scoreTerm({ ...input, docLength: 5 })).toBeCloseTo(ranker.scoreTerm({ ...input, docLength: 20 }));
  });
});
