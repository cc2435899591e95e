export * from "./bm25Ranker.js";
export * from "./docSet.js";
export * from "./documentSchemas.js";
export * from "./levenshteinFuzzyMatcher.js";
export * from "./memoryInvertedIndex.js";
export * from "./memorySearchEngine.js";
export * from "./memorySynonymTable.js";
export * from "./memoryTrie.js";
export * from "./minHeapTopK.js";
export * from "./porterStemmer.js";
export * from "./queryEvaluator.js";
export * from "./queryParser.js";
export * from "./simpleTokenizer.js";
export * from "./snapshotCodec.js";
export * from "./tfidfRanker.js";
