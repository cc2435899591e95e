import { describe, expect, it } from "vitest";
import { PorterStemmer } from "../porterStemmer.js";
import { SimpleTokenizer, analyze } from "../simpleTokenizer.js";

const terms = (tokenizer: SimpleTokenizer, text: string) => analyze(tokenizer, text).map((t) => t.term);

describe("SimpleTokenizer", () => {
  it("splits on word boundaries and lowercases", () => {
    const tokens = Array.from(new SimpleTokenizer().tokenize("Hello, World!", "title"));
    expect(tokens).toEqual([
      { term: "hello", position: 0, field: "title", startOffset: 0, endOffset: 5 },
      { term: "world", position: 1, field: "title", startOffset: 7, endOffset: 12 },
    ]);
  });

  it("keeps digits and folds diacritics by default", () => {
    const tokenizer = new SimpleTokenizer();
    expect(terms(tokenizer, "iPhone 14")).toEqual(["iphone", "14"]);
    expect(terms(tokenizer, "Café naïve")).toEqual(["cafe", "naive"]);
  });

  it("keeps diacritics when folding is off", () => {
    expect(terms(new SimpleTokenizer({ foldDiacritics: false }), "Café")).toEqual(["café"]);
  });

  it("keeps case when the call asks for it", () => {
    const tokens = analyze(new SimpleTokenizer(), "iPhone Pro", { normalizeCase: false });
    expect(tokens.map((t) => t.term)).toEqual(["iPhone", "Pro"]);
  });

  it("applies NFKC so compatibility forms match their plain spelling", () => {
    // U+FB01 LATIN SMALL LIGATURE FI
    expect(terms(new SimpleTokenizer(), "ﬁle")).toEqual(["file"]);
  });

  it("removes stop words without closing the position gap", () => {
    const tokenizer = new SimpleTokenizer({ removeStopWords: true });
    const tokens = analyze(tokenizer, "the quick fox");
    expect(tokens.map((t) => [t.term, t.position])).toEqual([
      ["quick", 1],
      ["fox", 2],
    ]);
  });

  it("lets a call override stop-word removal", () => {
    const tokenizer = new SimpleTokenizer({ removeStopWords: true });
    expect(analyze(tokenizer, "the fox", { removeStopWords: false }).map((t) => t.term)).toEqual(["the", "fox"]);
  });

  it("skips tokens outside the length bounds but counts their position", () => {
    const tokenizer = new SimpleTokenizer({ maxTokenLength: 3 });
    expect(analyze(tokenizer, "a abcd xyz").map((t) => [t.term, t.position])).toEqual([
      ["a", 0],
      ["xyz", 2],
    ]);
  });

  it("stems unless the call disables it", () => {
    const tokenizer = new SimpleTokenizer({ stemmer: new PorterStemmer() });
    expect(terms(tokenizer, "running cats")).toEqual(["run", "cat"]);
    expect(analyze(tokenizer, "running cats", { stem: false }).map((t) => t.term)).toEqual(["running", "cats"]);
  });

  it("yields nothing for empty or whitespace input", () => {
    const tokenizer = new SimpleTokenizer();
    expect(terms(tokenizer, "")).toEqual([]);
    expect(terms(tokenizer, "   \n\t ")).toEqual([]);
    expect(terms(tokenizer, "!!! ???")).toEqual([]);
  });

  it("is restartable and deterministic", () => {
    const seq = new SimpleTokenizer().tokenize("one two three", "body");
    const first = Array.from(seq);
    const second = Array.from(seq);
    expect(second).toEqual(first);
    expect(first).toHaveLength(3);
  });
});
