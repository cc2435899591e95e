import { IndexCorruptionError } from "../errors.js";
import type {
  DocumentRecord,
  FieldOccurrence,
  IndexReader,
  IndexState,
  IndexStats,
  InvertedIndex,
  Posting,
  PostingsList,
} from "../invertedIndex.js";
import type { Tokenizer } from "../tokenizer.js";
import type { TriePrefixResult } from "../trie.js";
import { compareDocIds, type DocId, type DocumentFields, type FieldName, type Term } from "../types.js";
import { isOrdered } from "./docSet.js";
import { MemoryTrie } from "./memoryTrie.js";

function isFieldMap(fields: DocumentFields): fields is ReadonlyMap<FieldName, string> {
  return fields instanceof Map;
}

/** Field entries of a document, in field-name order. */
export function fieldEntries(fields: DocumentFields): Array<[FieldName, string]> {
  const entries: Array<[FieldName, string]> = isFieldMap(fields)
    ? Array.from(fields.entries())
    : Object.entries(fields);
  return entries.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Pending edits to one term's postings within a draft. Applied once, at
 * commit, as a single merge with the base list.
 */
class TermEdits {
  private readonly dropped = new Set<DocId>();
  private readonly added = new Map<DocId, Posting>();

  drop(docId: DocId): void {
    this.added.delete(docId);
    this.dropped.add(docId);
  }

  put(posting: Posting): void {
    this.added.set(posting.docId, posting);
  }

  apply(base: readonly Posting[]): Posting[] {
    const kept = base.filter((p) => !this.dropped.has(p.docId) && !this.added.has(p.docId));
    if (this.added.size === 0) return kept;

    const added = Array.from(this.added.values()).sort((a, b) => compareDocIds(a.docId, b.docId));
    const out: Posting[] = [];
    let i = 0;
    let j = 0;
    while (i < kept.length || j < added.length) {
      const a = kept[i];
      const b = added[j];
      if (b === undefined || (a !== undefined && compareDocIds(a.docId, b.docId) < 0)) {
        if (a !== undefined) out.push(a);
        i++;
      } else {
        out.push(b);
        j++;
      }
    }
    return out;
  }
}

/**
 * One immutable version of the index.
 *
 * Data structure:
 * - term trie: term -> postings list (sorted by docId)
 * - document trie: docId -> document record
 */
class IndexVersion implements IndexReader {
  constructor(
    readonly version: number,
    readonly termTrie: MemoryTrie<PostingsList>,
    readonly docTrie: MemoryTrie<DocumentRecord>,
    readonly totalTokens: number,
  ) {}

  postingsFor(term: Term): PostingsList | undefined {
    return this.termTrie.get(term);
  }

  termsWithPrefix(prefix: string): Term[] {
    return Array.from(this.termTrie.keys(prefix));
  }

  completeTerm(prefix: string, limit: number): TriePrefixResult[] {
    return this.termTrie.complete(prefix, limit, (list) => list.df);
  }

  terms(): Iterable<Term> {
    return this.termTrie.keys();
  }

  hasTerm(term: Term): boolean {
    return this.termTrie.has(term);
  }

  document(id: DocId): DocumentRecord | undefined {
    return this.docTrie.get(id);
  }

  *documents(): Iterable<DocumentRecord> {
    for (const e of this.docTrie.entries()) yield e.value;
  }

  getStats(): IndexStats {
    const docCount = this.docTrie.size;
    return {
      docCount,
      termCount: this.termTrie.size,
      totalTokens: this.totalTokens,
      avgDocLen: docCount ? this.totalTokens / docCount : 0,
    };
  }
}

/**
 * Mutable working copy used while building the next version. Document records
 * go straight into the (persistent) doc trie; postings edits are buffered per
 * term so a batch rewrites each touched list and trie path once.
 */
class Draft {
  docs: MemoryTrie<DocumentRecord>;
  totalTokens: number;
  private readonly base: MemoryTrie<PostingsList>;
  private readonly edits = new Map<Term, TermEdits>();

  constructor(base: IndexVersion) {
    this.base = base.termTrie;
    this.docs = base.docTrie;
    this.totalTokens = base.totalTokens;
  }

  retract(id: DocId): boolean {
    const old = this.docs.get(id);
    if (!old) return false;

    for (const term of old.terms) this.editsFor(term).drop(id);
    this.docs = this.docs.delete(id);
    this.totalTokens -= old.length;
    return true;
  }

  insert(record: DocumentRecord, postings: ReadonlyMap<Term, Posting>): void {
    for (const [term, posting] of postings) this.editsFor(term).put(posting);
    this.docs = this.docs.set(record.id, record);
    this.totalTokens += record.length;
  }

  /** Term trie with every buffered edit applied; empty lists are pruned. */
  terms(): MemoryTrie<PostingsList> {
    let terms = this.base;
    for (const [term, edits] of this.edits) {
      const postings = edits.apply(this.base.get(term)?.postings ?? []);
      terms = postings.length ? terms.set(term, { term, df: postings.length, postings }) : terms.delete(term);
    }
    return terms;
  }

  private editsFor(term: Term): TermEdits {
    let edits = this.edits.get(term);
    if (!edits) {
      edits = new TermEdits();
      this.edits.set(term, edits);
    }
    return edits;
  }
}

export interface MemoryInvertedIndexDeps {
  tokenizer: Tokenizer;
}

/**
 * In-memory inverted index with copy-on-write versions.
 *
 * Writers build the next version from the current one (copying only the
 * postings lists they touch and the trie paths leading to them, once per
 * batch) and then swap a single pointer. Readers holding `snapshot()` never observe a partial update.
 */
export class MemoryInvertedIndex implements InvertedIndex {
  private current: IndexVersion = new IndexVersion(0, MemoryTrie.empty(), MemoryTrie.empty(), 0);

  constructor(private readonly deps: MemoryInvertedIndexDeps) {}

  get version(): number {
    return this.current.version;
  }

  snapshot(): IndexReader {
    return this.current;
  }

  addDocument(id: DocId, fields: DocumentFields): void {
    this.addDocuments([{ id, fields }]);
  }

  addDocuments(docs: Iterable<{ id: DocId; fields: DocumentFields }>): void {
    const draft = new Draft(this.current);
    let changed = false;

    for (const doc of docs) {
      // retract-then-insert keeps exactly one posting set per id
      draft.retract(doc.id);
      const { record, postings } = this.analyzeDocument(doc.id, doc.fields);
      draft.insert(record, postings);
      changed = true;
    }

    if (changed) this.commit(draft);
  }

  removeDocument(id: DocId): void {
    const draft = new Draft(this.current);
    if (draft.retract(id)) this.commit(draft);
  }

  restore(state: IndexState): void {
    let termTrie = MemoryTrie.empty<PostingsList>();
    const termsByDoc = new Map<DocId, Term[]>();
    for (const { term, postings } of state.postings) {
      termTrie = termTrie.set(term, { term, df: postings.length, postings });
      for (const p of postings) {
        let list = termsByDoc.get(p.docId);
        if (!list) {
          list = [];
          termsByDoc.set(p.docId, list);
        }
        list.push(term);
      }
    }

    let docTrie = MemoryTrie.empty<DocumentRecord>();
    let totalTokens = 0;
    for (const doc of state.documents) {
      const length = Object.values(doc.fieldLengths).reduce((a, b) => a + b, 0);
      const terms = (termsByDoc.get(doc.id) ?? []).sort();
      docTrie = docTrie.set(doc.id, { id: doc.id, fieldLengths: doc.fieldLengths, length, terms });
      totalTokens += length;
    }

    const next = new IndexVersion(this.current.version + 1, termTrie, docTrie, totalTokens);
    verifyVersion(next);
    this.current = next;
  }

  verifyIntegrity(): void {
    verifyVersion(this.current);
  }

  postingsFor(term: Term): PostingsList | undefined {
    return this.current.postingsFor(term);
  }

  termsWithPrefix(prefix: string): Term[] {
    return this.current.termsWithPrefix(prefix);
  }

  completeTerm(prefix: string, limit: number): TriePrefixResult[] {
    return this.current.completeTerm(prefix, limit);
  }

  terms(): Iterable<Term> {
    return this.current.terms();
  }

  hasTerm(term: Term): boolean {
    return this.current.hasTerm(term);
  }

  document(id: DocId): DocumentRecord | undefined {
    return this.current.document(id);
  }

  documents(): Iterable<DocumentRecord> {
    return this.current.documents();
  }

  getStats(): IndexStats {
    return this.current.getStats();
  }

  private commit(draft: Draft): void {
    this.current = new IndexVersion(this.current.version + 1, draft.terms(), draft.docs, draft.totalTokens);
  }

  private analyzeDocument(
    id: DocId,
    fields: DocumentFields,
  ): { record: DocumentRecord; postings: Map<Term, Posting> } {
    const byTerm = new Map<Term, FieldOccurrence[]>();
    const lengths: Array<[FieldName, number]> = [];
    let length = 0;

    for (const [field, text] of fieldEntries(fields)) {
      const positions = new Map<Term, number[]>();
      let fieldLength = 0;

      for (const tok of this.deps.tokenizer.tokenize(text, field)) {
        fieldLength++;
        let arr = positions.get(tok.term);
        if (!arr) {
          arr = [];
          positions.set(tok.term, arr);
        }
        arr.push(tok.position);
      }

      // fields are visited in name order, so occurrences stay sorted by field
      for (const [term, pos] of positions) {
        let occ = byTerm.get(term);
        if (!occ) {
          occ = [];
          byTerm.set(term, occ);
        }
        occ.push({ field, positions: pos });
      }

      lengths.push([field, fieldLength]);
      length += fieldLength;
    }

    const postings = new Map<Term, Posting>();
    for (const [term, occurrences] of byTerm) {
      const tf = occurrences.reduce((n, o) => n + o.positions.length, 0);
      postings.set(term, { docId: id, tf, occurrences });
    }

    const terms = Array.from(byTerm.keys()).sort();
    return { record: { id, fieldLengths: Object.fromEntries(lengths), length, terms }, postings };
  }
}

function verifyVersion(v: IndexVersion): void {
  for (const { key: term, value: list } of v.termTrie.entries()) {
    if (list.term !== term) {
      throw new IndexCorruptionError("postings list stored under the wrong term", { term, listTerm: list.term });
    }
    if (list.postings.length === 0) {
      throw new IndexCorruptionError("empty postings list was not pruned", { term });
    }
    if (list.df !== list.postings.length) {
      throw new IndexCorruptionError("document frequency does not match postings", { term, df: list.df });
    }
    if (!isOrdered(list.postings)) {
      throw new IndexCorruptionError("postings list is not ordered by document id", { term });
    }
    for (const p of list.postings) {
      const positions = p.occurrences.reduce((n, o) => n + o.positions.length, 0);
      if (p.tf !== positions) {
        throw new IndexCorruptionError("term frequency does not match positions", { term, docId: p.docId });
      }
      const doc = v.docTrie.get(p.docId);
      if (!doc) {
        throw new IndexCorruptionError("posting refers to an unknown document", { term, docId: p.docId });
      }
      verifyOccurrences(term, p, doc);
    }
  }
}

function isStrictlyIncreasing<T>(values: readonly T[], compare: (a: T, b: T) => number): boolean {
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    const cur = values[i];
    if (prev === undefined || cur === undefined || compare(prev, cur) >= 0) return false;
  }
  return true;
}

function verifyOccurrences(term: Term, posting: Posting, doc: DocumentRecord): void {
  const ctx = { term, docId: posting.docId };
  if (!isStrictlyIncreasing(posting.occurrences.map((o) => o.field), compareDocIds)) {
    throw new IndexCorruptionError("occurrence fields are repeated or out of order", ctx);
  }
  for (const occ of posting.occurrences) {
    if (!Object.hasOwn(doc.fieldLengths, occ.field)) {
      throw new IndexCorruptionError("occurrence in a field the document does not have", { ...ctx, field: occ.field });
    }
    if (!isStrictlyIncreasing(occ.positions, (a, b) => a - b)) {
      throw new IndexCorruptionError("positions are repeated or out of order", { ...ctx, field: occ.field });
    }
  }
}
