import type { TriePrefixResult } from "./trie.js";
import type { DocId, DocumentFields, FieldName, Term } from "./types.js";

export interface FieldOccurrence {
  field: FieldName;
  /** ascending token positions of the term within the field */
  positions: readonly number[];
}

export interface Posting {
  docId: DocId;
  /** term frequency within the doc; always the total number of positions */
  tf: number;
  /** one entry per field the term occurs in, ordered by field name */
  occurrences: readonly FieldOccurrence[];
}

export interface PostingsList {
  term: Term;
  df: number;
  /** ordered by docId, no duplicates */
  postings: readonly Posting[];
}

export interface DocumentRecord {
  id: DocId;
  /** token count per field */
  fieldLengths: Readonly<Record<FieldName, number>>;
  /** total token count */
  length: number;
  /** distinct terms of the document, sorted; used to retract its postings */
  terms: readonly Term[];
}

export interface IndexStats {
  docCount: number;
  termCount: number;
  totalTokens: number;
  /** average document length in tokens */
  avgDocLen: number;
}

/** Anything that can enumerate and test terms. */
export interface TermDictionary {
  terms(): Iterable<Term>;
  hasTerm(term: Term): boolean;
}

/**
 * One immutable version of the index. Everything read during a single search
 * comes from the same reader.
 */
export interface IndexReader extends TermDictionary {
  readonly version: number;

  postingsFor(term: Term): PostingsList | undefined;
  termsWithPrefix(prefix: string): Term[];
  /** Up to `limit` terms starting with `prefix`, weighted by document frequency. */
  completeTerm(prefix: string, limit: number): TriePrefixResult[];

  document(id: DocId): DocumentRecord | undefined;
  documents(): Iterable<DocumentRecord>;

  getStats(): IndexStats;
}

/** Index contents in the form used by snapshot restore. */
export interface IndexState {
  documents: Iterable<Pick<DocumentRecord, "id" | "fieldLengths">>;
  postings: Iterable<{ term: Term; postings: readonly Posting[] }>;
}

/**
 * Inverted index mapping term -> postings.
 *
 * Contract notes:
 * - `addDocument` replaces any previous postings of the same id
 * - `removeDocument` of an unknown id is a no-op
 * - every mutation becomes visible at once, through a new `snapshot()`
 */
export interface InvertedIndex extends IndexReader {
  addDocument(id: DocId, fields: DocumentFields): void;
  addDocuments(docs: Iterable<{ id: DocId; fields: DocumentFields }>): void;
  removeDocument(id: DocId): void;

  snapshot(): IndexReader;
  restore(state: IndexState): void;

  /** Throws IndexCorruptionError when an invariant is broken. */
  verifyIntegrity(): void;
}
