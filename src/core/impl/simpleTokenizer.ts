import type { FieldName, Token } from "../types.js";
import type { Stemmer, TokenizeOptions, Tokenizer } from "../tokenizer.js";

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "but",
  "by",
  "for",
  "if",
  "in",
  "into",
  "is",
  "it",
  "no",
  "not",
  "of",
  "on",
  "or",
  "such",
  "that",
  "the",
  "their",
  "then",
  "there",
  "these",
  "they",
  "this",
  "to",
  "was",
  "will",
  "with",
]);

export interface SimpleTokenizerOptions {
  stemmer?: Stemmer;
  stopWords?: ReadonlySet<string>;
  /** default for `TokenizeOptions.removeStopWords` */
  removeStopWords?: boolean;
  /** strip combining marks after NFD decomposition ("café" -> "cafe") */
  foldDiacritics?: boolean;
  minTokenLength?: number;
  maxTokenLength?: number;
  /** locale handed to Intl.Segmenter */
  locale?: string;
}

const NON_WORD_CHARS = /[^\p{L}\p{N}]+/gu;
const COMBINING_MARKS = /\p{M}+/gu;

/**
 * Unicode-aware tokenizer:
 * - splits on word boundaries (Intl.Segmenter), keeping only word-like segments
 * - NFKC-normalizes, optionally lowercases and folds diacritics
 * - strips punctuation left inside a word ("don't" -> "dont")
 * - optionally removes stop words and stems
 * - yields token positions (token index within the field)
 *
 * Skipped words (stop words, out-of-range lengths) still consume a position so
 * phrase adjacency is measured against the original text.
 */
export class SimpleTokenizer implements Tokenizer {
  private readonly segmenter: Intl.Segmenter;
  private readonly stemmer?: Stemmer;
  private readonly stopWords: ReadonlySet<string>;
  private readonly removeStopWords: boolean;
  private readonly foldDiacritics: boolean;
  private readonly minTokenLength: number;
  private readonly maxTokenLength: number;

  constructor(options: SimpleTokenizerOptions = {}) {
    this.segmenter = new Intl.Segmenter(options.locale ?? "en", { granularity: "word" });
    this.stemmer = options.stemmer;
    this.stopWords = options.stopWords ?? DEFAULT_STOP_WORDS;
    this.removeStopWords = options.removeStopWords ?? false;
    this.foldDiacritics = options.foldDiacritics ?? true;
    this.minTokenLength = options.minTokenLength ?? 1;
    this.maxTokenLength = options.maxTokenLength ?? 100;
  }

  tokenize(text: string, field: FieldName, options?: TokenizeOptions): Iterable<Token> {
    return {
      [Symbol.iterator]: () => this.generate(text, field, options),
    };
  }

  /** Normalized form of a single word, before stop-word and stemming. */
  normalizeWord(word: string, normalizeCase = true): string {
    let w = word.normalize("NFKC");
    if (normalizeCase) w = w.toLowerCase();
    if (this.foldDiacritics) w = w.normalize("NFD").replace(COMBINING_MARKS, "").normalize("NFC");
    return w.replace(NON_WORD_CHARS, "");
  }

  private *generate(text: string, field: FieldName, options?: TokenizeOptions): Generator<Token, void, undefined> {
    const normalizeCase = options?.normalizeCase ?? true;
    const removeStopWords = options?.removeStopWords ?? this.removeStopWords;
    const stem = (options?.stem ?? true) && this.stemmer !== undefined;

    let position = 0;
    for (const seg of this.segmenter.segment(text)) {
      if (!seg.isWordLike) continue;

      let term = this.normalizeWord(seg.segment, normalizeCase);
      if (!term) continue;

      const skip =
        term.length < this.minTokenLength ||
        term.length > this.maxTokenLength ||
        (removeStopWords && this.stopWords.has(term));

      if (!skip) {
        if (stem && this.stemmer) term = this.stemmer.stem(term);
        yield {
          term,
          position,
          field,
          startOffset: seg.index,
          endOffset: seg.index + seg.segment.length,
        };
      }

      position++;
    }
  }
}

/** Collects the terms of `text`, in order. */
export function analyze(tokenizer: Tokenizer, text: string, options?: TokenizeOptions): Token[] {
  return Array.from(tokenizer.tokenize(text, "", options));
}
