import { describe, expect, it } from "vitest";
import { IndexCorruptionError } from "../../errors.js";
import { isOrdered } from "../docSet.js";
import { MemoryInvertedIndex } from "../memoryInvertedIndex.js";
import { SimpleTokenizer } from "../simpleTokenizer.js";

function newIndex(): MemoryInvertedIndex {
  return new MemoryInvertedIndex({ tokenizer: new SimpleTokenizer() });
}

describe("MemoryInvertedIndex", () => {
  it("records one posting per document with per-field positions", () => {
    const index = newIndex();
    index.addDocument("d1", { title: "red shoes", body: "red red" });

    expect(index.postingsFor("red")).toEqual({
      term: "red",
      df: 1,
      postings: [
        {
          docId: "d1",
          tf: 3,
          occurrences: [
            { field: "body", positions: [0, 1] },
            { field: "title", positions: [0] },
          ],
        },
      ],
    });
    expect(index.document("d1")).toEqual({
      id: "d1",
      fieldLengths: { body: 2, title: 2 },
      length: 4,
      terms: ["red", "shoes"],
    });
  });

  it("accepts fields as a Map", () => {
    const index = newIndex();
    index.addDocument("d1", new Map([["name", "iPad"]]));
    expect(index.postingsFor("ipad")?.postings.map((p) => p.docId)).toEqual(["d1"]);
  });

  it("keeps postings ordered by document id", () => {
    const index = newIndex();
    for (const id of ["b", "a", "c"]) index.addDocument(id, { body: "shared" });
    expect(index.postingsFor("shared")?.postings.map((p) => p.docId)).toEqual(["a", "b", "c"]);
    expect(index.postingsFor("shared")?.df).toBe(3);
  });

  it("retracts old postings when a document is re-ingested", () => {
    const index = newIndex();
    index.addDocument("d1", { body: "alpha beta" });
    index.addDocument("d1", { body: "beta gamma" });

    expect(index.postingsFor("alpha")).toBeUndefined();
    expect(index.postingsFor("beta")?.postings).toHaveLength(1);
    expect(index.postingsFor("gamma")?.postings.map((p) => p.docId)).toEqual(["d1"]);
    expect(index.getStats()).toEqual({ docCount: 1, termCount: 2, totalTokens: 2, avgDocLen: 2 });
  });

  it("prunes empty postings lists on removal", () => {
    const index = newIndex();
    index.addDocument("d1", { body: "solo shared" });
    index.addDocument("d2", { body: "shared" });
    index.removeDocument("d1");

    expect(index.postingsFor("solo")).toBeUndefined();
    expect(index.hasTerm("solo")).toBe(false);
    expect(index.postingsFor("shared")?.postings.map((p) => p.docId)).toEqual(["d2"]);
    expect(index.document("d1")).toBeUndefined();
  });

  it("ignores removal of an unknown id", () => {
    const index = newIndex();
    index.addDocument("d1", { body: "x" });
    const version = index.version;
    index.removeDocument("nope");
    expect(index.version).toBe(version);
    expect(index.getStats().docCount).toBe(1);
  });

  it("answers prefix queries from the term dictionary", () => {
    const index = newIndex();
    index.addDocument("d1", { name: "iPhone 14" });
    index.addDocument("d2", { name: "iPad", description: "tablet" });
    index.addDocument("d3", { name: "iPad mini" });

    expect(index.termsWithPrefix("ip")).toEqual(["ipad", "iphone"]);
    expect(index.termsWithPrefix("z")).toEqual([]);
    expect(index.completeTerm("ip", 5)).toEqual([
      { term: "ipad", weight: 2 },
      { term: "iphone", weight: 1 },
    ]);
  });

  it("hands out snapshots that later writes do not change", () => {
    const index = newIndex();
    index.addDocument("d1", { body: "stable" });
    const snap = index.snapshot();

    index.addDocument("d2", { body: "stable" });
    index.removeDocument("d1");

    expect(snap.postingsFor("stable")?.postings.map((p) => p.docId)).toEqual(["d1"]);
    expect(snap.getStats().docCount).toBe(1);
    expect(index.postingsFor("stable")?.postings.map((p) => p.docId)).toEqual(["d2"]);
    expect(index.version).toBeGreaterThan(snap.version);
  });

  it("commits a batch as a single version", () => {
    const index = newIndex();
    const before = index.version;
    index.addDocuments([
      { id: "a", fields: { body: "one" } },
      { id: "b", fields: { body: "two" } },
    ]);
    expect(index.version).toBe(before + 1);
    expect(index.getStats().docCount).toBe(2);
  });

  it("applies re-ingests inside one batch in order", () => {
    const index = newIndex();
    index.addDocument("a", { body: "old shared" });
    index.addDocuments([
      { id: "b", fields: { body: "shared" } },
      { id: "a", fields: { body: "new" } },
      { id: "b", fields: { body: "fresh shared" } },
    ]);

    expect(index.hasTerm("old")).toBe(false);
    expect(index.postingsFor("shared")).toEqual({
      term: "shared",
      df: 1,
      postings: [{ docId: "b", tf: 1, occurrences: [{ field: "body", positions: [1] }] }],
    });
    expect(index.postingsFor("new")?.postings.map((p) => p.docId)).toEqual(["a"]);
    expect(index.getStats()).toEqual({ docCount: 2, termCount: 3, totalTokens: 3, avgDocLen: 1.5 });
    expect(() => index.verifyIntegrity()).not.toThrow();
  });

  it("merges a large batch into one postings list", () => {
    const index = newIndex();
    index.addDocument("d10000", { body: "common" });
    const docs = Array.from({ length: 20000 }, (_, i) => ({
      id: `d${String(i * 2).padStart(5, "0")}`,
      fields: { body: "common" },
    }));
    index.addDocuments(docs);

    const list = index.postingsFor("common");
    expect(list?.df).toBe(20000);
    expect(list?.postings[0]?.docId).toBe("d00000");
    expect(isOrdered(list?.postings ?? [])).toBe(true);
  });

  it("passes its own integrity check", () => {
    const index = newIndex();
    index.addDocument("d1", { title: "a b c", body: "c d" });
    index.addDocument("d2", { title: "d e" });
    index.removeDocument("d1");
    expect(() => index.verifyIntegrity()).not.toThrow();
  });

  it("rejects a restore that breaks an invariant and keeps the current version", () => {
    const index = newIndex();
    index.addDocument("keep", { body: "kept" });

    expect(() =>
      index.restore({
        documents: [
          { id: "a", fieldLengths: { body: 1 } },
          { id: "b", fieldLengths: { body: 1 } },
        ],
        postings: [
          {
            term: "x",
            postings: [
              { docId: "b", tf: 1, occurrences: [{ field: "body", positions: [0] }] },
              { docId: "a", tf: 1, occurrences: [{ field: "body", positions: [0] }] },
            ],
          },
        ],
      }),
    ).toThrow(IndexCorruptionError);

    expect(index.document("keep")?.length).toBe(1);
    expect(index.hasTerm("x")).toBe(false);
  });

  it.each([
    ["positions are repeated or out of order", [{ field: "body", positions: [1, 0] }]],
    ["positions are repeated or out of order", [{ field: "body", positions: [0, 0] }]],
    [
      "occurrence fields are repeated or out of order",
      [
        { field: "title", positions: [0] },
        { field: "body", positions: [1] },
      ],
    ],
    [
      "occurrence fields are repeated or out of order",
      [
        { field: "body", positions: [0] },
        { field: "body", positions: [1] },
      ],
    ],
    ["occurrence in a field the document does not have", [{ field: "summary", positions: [0, 1] }]],
  ])("rejects a restore where %s", (message, occurrences) => {
    const index = newIndex();
    const restore = () =>
      index.restore({
        documents: [{ id: "a", fieldLengths: { body: 2, title: 1 } }],
        postings: [{ term: "x", postings: [{ docId: "a", tf: 2, occurrences }] }],
      });
    expect(restore).toThrow(IndexCorruptionError);
    expect(restore).toThrow(message);
    expect(index.getStats().docCount).toBe(0);
  });

  it("restores a consistent state", () => {
    const index = newIndex();
    index.restore({
      documents: [{ id: "a", fieldLengths: { body: 2 } }],
      postings: [
        { term: "hello", postings: [{ docId: "a", tf: 1, occurrences: [{ field: "body", positions: [0] }] }] },
        { term: "world", postings: [{ docId: "a", tf: 1, occurrences: [{ field: "body", positions: [1] }] }] },
      ],
    });
    expect(index.document("a")).toEqual({ id: "a", fieldLengths: { body: 2 }, length: 2, terms: ["hello", "world"] });
    expect(index.getStats()).toEqual({ docCount: 1, termCount: 2, totalTokens: 2, avgDocLen: 2 });
  });
});
