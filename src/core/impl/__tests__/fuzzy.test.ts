import { describe, expect, it } from "vitest";
import type { TermDictionary } from "../../invertedIndex.js";
import { LevenshteinFuzzyMatcher, boundedEditDistance } from "../levenshteinFuzzyMatcher.js";

function dictionary(terms: string[]): TermDictionary {
  return {
    terms: () => terms,
    hasTerm: (t) => terms.includes(t),
  };
}

describe("boundedEditDistance", () => {
  it("computes Levenshtein distance within the bound", () => {
    expect(boundedEditDistance("kitten", "sitting", 5)).toBe(3);
    expect(boundedEditDistance("iphone", "ihpone", 2)).toBe(2);
    expect(boundedEditDistance("same", "same", 0)).toBe(0);
    expect(boundedEditDistance("", "abc", 5)).toBe(3);
  });

  it("returns max + 1 once the bound is exceeded", () => {
    expect(boundedEditDistance("kitten", "sitting", 2)).toBe(3);
    expect(boundedEditDistance("a", "abcd", 1)).toBe(2);
    expect(boundedEditDistance("abc", "xyz", 1)).toBe(2);
  });
});

describe("LevenshteinFuzzyMatcher", () => {
  const dict = dictionary(["iphone", "ipad", "tablet", "phone"]);

  it("finds terms within the distance, nearest first", () => {
    const matcher = new LevenshteinFuzzyMatcher();
    expect(matcher.expand("ihpone", 2, dict)).toEqual([
      { term: "iphone", distance: 2 },
      { term: "phone", distance: 2 },
    ]);
    expect(matcher.expand("iphone", 1, dict)).toEqual([
      { term: "iphone", distance: 0 },
      { term: "phone", distance: 1 },
    ]);
  });

  it("returns only the exact term at distance 0", () => {
    const matcher = new LevenshteinFuzzyMatcher();
    expect(matcher.expand("ipad", 0, dict)).toEqual([{ term: "ipad", distance: 0 }]);
    expect(matcher.expand("ipod", 0, dict)).toEqual([]);
  });

  it("only grows as the distance grows", () => {
    const matcher = new LevenshteinFuzzyMatcher();
    const terms = (k: number) => matcher.expand("ipod", k, dict).map((m) => m.term);
    for (let k = 0; k < 4; k++) {
      expect(terms(k + 1)).toEqual(expect.arrayContaining(terms(k)));
    }
  });

  it("requires a shared prefix when configured", () => {
    const matcher = new LevenshteinFuzzyMatcher({ prefixLength: 1 });
    expect(matcher.expand("iphone", 1, dict).map((m) => m.term)).toEqual(["iphone"]);
  });
});
