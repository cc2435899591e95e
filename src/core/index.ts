export * from "./errors.js";
export type * from "./fuzzy.js";
export type * from "./heap.js";
export type * from "./invertedIndex.js";
export type * from "./query.js";
export type * from "./ranker.js";
export type * from "./synonyms.js";
export type * from "./tokenizer.js";
export type * from "./trie.js";
export * from "./types.js";
export * from "./impl/index.js";
