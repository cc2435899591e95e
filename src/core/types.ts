/** Shared core types used by module contracts. */

export type DocId = string;
export type Term = string;
export type FieldName = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the field (token ordinal, not byte offset). */
  position: number;
  field: FieldName;
  /** Character offsets into the source text, for highlighting. */
  startOffset: number;
  endOffset: number;
}

/** Named text fields of a document. Either a plain record or a Map is accepted. */
export type DocumentFields = Readonly<Record<FieldName, string>> | ReadonlyMap<FieldName, string>;

export interface DocumentInput {
  id: DocId;
  fields: DocumentFields;
}

/** Terms of one field that contributed to a hit. */
export interface FieldExplanation {
  field: FieldName;
  terms: Term[];
}

export interface ScoredResult {
  docId: DocId;
  score: number;
  explanation?: FieldExplanation[];
}

/** Ordering used for postings lists and score tie-breaks. */
export function compareDocIds(a: DocId, b: DocId): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
