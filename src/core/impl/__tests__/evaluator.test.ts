import { describe, expect, it } from "vitest";
import { QuerySyntaxError, SearchCancelledError } from "../../errors.js";
import type { Ranker, TermScoreInput } from "../../ranker.js";
import type { DocumentFields } from "../../types.js";
import { LevenshteinFuzzyMatcher } from "../levenshteinFuzzyMatcher.js";
import { MemoryInvertedIndex } from "../memoryInvertedIndex.js";
import { MemorySynonymTable } from "../memorySynonymTable.js";
import { QueryEvaluator, type EvaluateOptions } from "../queryEvaluator.js";
import { parseQuery } from "../queryParser.js";
import { SimpleTokenizer } from "../simpleTokenizer.js";
import { TfIdfRanker } from "../tfidfRanker.js";

interface Fixture {
  evaluator: QueryEvaluator;
  run(query: string, options?: Partial<EvaluateOptions>): Promise<string[]>;
  options: Pick<EvaluateOptions, "index" | "synonyms">;
}

interface SetupOptions {
  tokenizer?: SimpleTokenizer;
  ranker?: Ranker;
  synonyms?: MemorySynonymTable;
}

function setup(
  docs: Record<string, DocumentFields>,
  { tokenizer = new SimpleTokenizer(), ranker = new TfIdfRanker(), synonyms = new MemorySynonymTable() }: SetupOptions = {},
): Fixture {
  const index = new MemoryInvertedIndex({ tokenizer });
  for (const [id, fields] of Object.entries(docs)) index.addDocument(id, fields);

  const evaluator = new QueryEvaluator({ tokenizer, fuzzy: new LevenshteinFuzzyMatcher(), ranker });
  const options = { index: index.snapshot(), synonyms: synonyms.snapshot() };
  return {
    evaluator,
    options,
    async run(query, extra = {}) {
      const results = await evaluator.evaluate(parseQuery(query), { ...options, ...extra, query });
      return results.map((r) => r.docId);
    },
  };
}

const shop = {
  d1: { title: "red shoes", body: "comfortable running shoes" },
  d2: { title: "blue shoes", body: "red laces" },
  d3: { title: "red hat" },
};

describe("QueryEvaluator", () => {
  it("intersects the clauses of an AND", async () => {
    const { run } = setup(shop);
    expect((await run("red shoes")).sort()).toEqual(["d1", "d2"]);
  });

  it("requires phrase words to be adjacent within one field", async () => {
    const { run } = setup(shop);
    expect(await run('"red shoes"')).toEqual(["d1"]);
    expect(await run('"shoes red"')).toEqual([]);
  });

  it("subtracts negated clauses", async () => {
    const { run } = setup(shop);
    expect((await run("red -hat")).sort()).toEqual(["d1", "d2"]);
    expect(await run("red -shoes")).toEqual(["d3"]);
  });

  it("unions OR clauses", async () => {
    const { run } = setup(shop);
    expect((await run("laces | hat")).sort()).toEqual(["d2", "d3"]);
  });

  it("expands prefixes over the term dictionary", async () => {
    const { run } = setup(shop);
    expect((await run("sho*")).sort()).toEqual(["d1", "d2"]);
    expect(await run("zz*")).toEqual([]);
  });

  it("restricts matching to the requested fields", async () => {
    const { run } = setup(shop);
    expect((await run("red", { fields: new Set(["title"]) })).sort()).toEqual(["d1", "d3"]);
    expect(await run("laces", { fields: new Set(["title"]) })).toEqual([]);
  });

  it("scores with tf-idf", async () => {
    const { evaluator, options } = setup(shop, { ranker: new TfIdfRanker({ normalizeLength: false }) });
    const [hit] = await evaluator.evaluate(parseQuery("hat"), options);
    // N = 3, df = 1, tf = 1
    expect(hit?.docId).toBe("d3");
    expect(hit?.score).toBeCloseTo(1 + Math.log(2));
  });

  it("discounts fuzzy matches by their distance", async () => {
    const { evaluator, options } = setup(shop, { ranker: new TfIdfRanker({ normalizeLength: false }) });
    expect(await evaluator.evaluate(parseQuery("hats"), options)).toEqual([]);

    const [hit] = await evaluator.evaluate(parseQuery("hats"), { ...options, maxFuzzyDistance: 1 });
    expect(hit?.docId).toBe("d3");
    expect(hit?.score).toBeCloseTo((1 + Math.log(2)) / 2);
  });

  it("expands synonyms at query time", async () => {
    const synonyms = new MemorySynonymTable([["hat", "cap"]]);
    const { run } = setup(shop, { synonyms });
    expect(await run("cap")).toEqual(["d3"]);
  });

  it("orders by score, then document id", async () => {
    const { run } = setup({
      c: { body: "cat cat cat" },
      a: { body: "cat" },
      b: { body: "cat" },
    });
    expect(await run("cat")).toEqual(["c", "a", "b"]);
  });

  it("explains which terms matched in which field", async () => {
    const { evaluator, options } = setup(shop);
    const results = await evaluator.evaluate(parseQuery("red | laces"), { ...options, explain: true });
    const d2 = results.find((r) => r.docId === "d2");
    expect(d2?.explanation).toEqual([{ field: "body", terms: ["laces", "red"] }]);

    const d1 = results.find((r) => r.docId === "d1");
    expect(d1?.explanation).toEqual([{ field: "title", terms: ["red"] }]);
  });

  it("treats a word that splits into several terms as a phrase", async () => {
    const { run } = setup({
      near: { body: "free wi fi here" },
      apart: { body: "fi and wi" },
    });
    expect(await run("wi-fi")).toEqual(["near"]);
  });

  it("measures phrase adjacency against positions left by removed stop words", async () => {
    const tokenizer = new SimpleTokenizer({ removeStopWords: true });
    const { run } = setup({ d: { body: "the cat in the hat" } }, { tokenizer });
    expect(await run('"cat in the hat"')).toEqual(["d"]);
    expect(await run('"cat hat"')).toEqual([]);
    // a stop word alone places no constraint
    expect(await run("the cat")).toEqual(["d"]);
  });

  it("rejects a negation without a positive sibling", async () => {
    const { run } = setup(shop);
    await expect(run("-red")).rejects.toBeInstanceOf(QuerySyntaxError);
    await expect(run("hat | -red")).rejects.toBeInstanceOf(QuerySyntaxError);
  });

  it("rejects a prefix that is more than one word", async () => {
    const { run } = setup(shop);
    await expect(run("wi-f*")).rejects.toThrow("a prefix must be a single word at position 0");
  });

  it("stops when the signal is already aborted", async () => {
    const { run } = setup(shop);
    const controller = new AbortController();
    controller.abort();
    await expect(run("red", { signal: controller.signal })).rejects.toBeInstanceOf(SearchCancelledError);
  });

  it("checks the signal between top-level clauses", async () => {
    const controller = new AbortController();
    const aborting: Ranker = {
      scoreTerm(input: TermScoreInput) {
        controller.abort();
        return input.tf;
      },
    };
    const { run } = setup(shop, { ranker: aborting });
    await expect(run("red | hat", { signal: controller.signal })).rejects.toBeInstanceOf(SearchCancelledError);
  });
});
