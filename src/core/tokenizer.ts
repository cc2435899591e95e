import type { FieldName, Token } from "./types.js";

/** Reduces a word to its stem. Any object with `stem` can be plugged in. */
export interface Stemmer {
  stem(word: string): string;
}

export interface TokenizeOptions {
  /** If true, normalize case (implementation-defined, usually lowercase). */
  normalizeCase?: boolean;
  /** If true, drop tokens that are common stop-words. */
  removeStopWords?: boolean;
  /** Set to false to bypass the configured stemmer (e.g. for prefixes). */
  stem?: boolean;
}

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - must be deterministic for given input+options
 * - the returned iterable is lazy and restartable: every iteration starts over
 * - empty or whitespace-only input yields nothing
 */
export interface Tokenizer {
  tokenize(text: string, field: FieldName, options?: TokenizeOptions): Iterable<Token>;
}
