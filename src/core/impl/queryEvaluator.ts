import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import { QuerySyntaxError, SearchCancelledError } from "../errors.js";
import type { FuzzyMatcher } from "../fuzzy.js";
import type { IndexReader, Posting, PostingsList } from "../invertedIndex.js";
import type { PhraseNode, PrefixNode, QueryNode, TermNode } from "../query.js";
import type { Ranker } from "../ranker.js";
import type { SynonymLookup } from "../synonyms.js";
import type { Tokenizer } from "../tokenizer.js";
import {
  compareDocIds,
  type DocId,
  type FieldExplanation,
  type FieldName,
  type ScoredResult,
  type Term,
  type Token,
} from "../types.js";
import { difference, intersectAll, unionAll, type DocMatch, type DocMatches, type MatchHit } from "./docSet.js";
import { validateNegations } from "./queryParser.js";
import { analyze } from "./simpleTokenizer.js";

export interface EvaluateOptions {
  index: IndexReader;
  synonyms: SynonymLookup;
  /** 0 disables fuzzy expansion */
  maxFuzzyDistance?: number;
  /** restrict matching to these fields */
  fields?: ReadonlySet<FieldName>;
  /** attach per-field matched terms to results */
  explain?: boolean;
  /** checked before each top-level clause */
  signal?: AbortSignal;
  /** original query text, for error positions */
  query?: string;
}

export interface QueryEvaluatorDeps {
  tokenizer: Tokenizer;
  fuzzy: FuzzyMatcher;
  ranker: Ranker;
  /** multiplier on term frequency per field; 1 when absent */
  fieldWeights?: ReadonlyMap<FieldName, number>;
}

/** Score descending, then docId ascending. */
export function compareResults(a: { docId: DocId; score: number }, b: { docId: DocId; score: number }): number {
  return b.score - a.score || compareDocIds(a.docId, b.docId);
}

export function toScoredResult(match: DocMatch, explain: boolean): ScoredResult {
  if (!explain) return { docId: match.docId, score: match.score };

  const byField = new Map<FieldName, Set<Term>>();
  for (const hit of match.hits ?? []) {
    let terms = byField.get(hit.field);
    if (!terms) {
      terms = new Set();
      byField.set(hit.field, terms);
    }
    terms.add(hit.term);
  }

  const explanation: FieldExplanation[] = Array.from(byField.keys())
    .sort()
    .map((field) => ({ field, terms: Array.from(byField.get(field) ?? []).sort() }));
  return { docId: match.docId, score: match.score, explanation };
}

function containsSorted(values: readonly number[], target: number): boolean {
  let lo = 0;
  let hi = values.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const v = values[mid] ?? 0;
    if (v === target) return true;
    if (v < target) lo = mid + 1;
    else hi = mid - 1;
  }
  return false;
}

type Clause = { negated: boolean; matches: DocMatches | undefined };

/**
 * State of one evaluation: a fixed index version and synonym lookup, plus
 * per-document length caches. `undefined` from `lower` means the clause places
 * no constraint (it normalized to nothing, e.g. only stop words).
 */
class Evaluation {
  private readonly docCount: number;
  private readonly lengths = new Map<DocId, number>();
  private avgLength: number | undefined;

  constructor(
    private readonly deps: QueryEvaluatorDeps,
    private readonly opts: EvaluateOptions,
  ) {
    this.docCount = opts.index.getStats().docCount;
  }

  lower(node: QueryNode): DocMatches | undefined {
    switch (node.kind) {
      case "term":
        return this.term(node);
      case "phrase":
        return this.phrase(node);
      case "prefix":
        return this.prefix(node);
      case "and":
        return this.and(node.children.map((c) => this.clause(c)));
      case "or":
        return this.or(node.children.map((c) => this.lower(c)));
      case "not":
        throw new QuerySyntaxError("a negated clause needs a positive clause beside it", this.opts.query ?? "", node.position);
    }
  }

  clause(node: QueryNode): Clause {
    return node.kind === "not"
      ? { negated: true, matches: this.lower(node.child) }
      : { negated: false, matches: this.lower(node) };
  }

  and(clauses: readonly Clause[]): DocMatches | undefined {
    const positives: DocMatches[] = [];
    const negatives: DocMatches[] = [];
    for (const c of clauses) {
      if (c.matches) (c.negated ? negatives : positives).push(c.matches);
    }
    if (!positives.length) return undefined;

    let acc = intersectAll(positives);
    for (const neg of negatives) {
      if (!acc.length) break;
      acc = difference(acc, neg);
    }
    return acc;
  }

  or(parts: ReadonlyArray<DocMatches | undefined>): DocMatches | undefined {
    const lists = parts.filter((p): p is DocMatches => p !== undefined);
    return lists.length ? unionAll(lists) : undefined;
  }

  private term(node: TermNode): DocMatches | undefined {
    const tokens = analyze(this.deps.tokenizer, node.text);
    const first = tokens[0];
    if (!first) return undefined;
    // "wi-fi" style words split into several terms and must stay adjacent
    if (tokens.length > 1) return this.phraseOf(tokens);

    const maxDistance = this.opts.maxFuzzyDistance ?? 0;
    const expansions = new Map<Term, number>();
    for (const synonym of this.opts.synonyms.expand(first.term)) {
      expansions.set(synonym, 0);
      if (maxDistance <= 0) continue;
      for (const m of this.deps.fuzzy.expand(synonym, maxDistance, this.opts.index)) {
        const prev = expansions.get(m.term);
        if (prev === undefined || m.distance < prev) expansions.set(m.term, m.distance);
      }
    }

    const lists: DocMatches[] = [];
    for (const [term, distance] of expansions) {
      const list = this.opts.index.postingsFor(term);
      // fuzzy matches count less the further they are from what was typed
      if (list) lists.push(this.scorePostings(list, 1 / (1 + distance)));
    }
    return unionAll(lists);
  }

  private prefix(node: PrefixNode): DocMatches | undefined {
    const tokens = analyze(this.deps.tokenizer, node.prefix, { stem: false, removeStopWords: false });
    const first = tokens[0];
    if (!first) return undefined;
    if (tokens.length > 1) {
      throw new QuerySyntaxError("a prefix must be a single word", this.opts.query ?? "", node.position);
    }

    const lists: DocMatches[] = [];
    for (const term of this.opts.index.termsWithPrefix(first.term)) {
      const list = this.opts.index.postingsFor(term);
      if (list) lists.push(this.scorePostings(list, 1));
    }
    return unionAll(lists);
  }

  private phrase(node: PhraseNode): DocMatches | undefined {
    const tokens = analyze(this.deps.tokenizer, node.words.join(" "));
    const first = tokens[0];
    if (!first) return undefined;
    if (tokens.length === 1) {
      const list = this.opts.index.postingsFor(first.term);
      return list ? this.scorePostings(list, 1) : [];
    }
    return this.phraseOf(tokens);
  }

  /** Documents where the tokens occur in one field at the query's relative positions. */
  private phraseOf(tokens: readonly Token[]): DocMatches {
    const base = tokens[0]?.position ?? 0;
    const offsets = tokens.map((t) => t.position - base);
    const label = tokens.map((t) => t.term).join(" ");

    const lists: PostingsList[] = [];
    for (const t of tokens) {
      const list = this.opts.index.postingsFor(t.term);
      if (!list) return [];
      lists.push(list);
    }

    // drive the walk with the shortest list, advance cursors on the others
    let driver = 0;
    lists.forEach((l, i) => {
      if (l.postings.length < (lists[driver]?.postings.length ?? 0)) driver = i;
    });
    const cursors = lists.map(() => 0);
    const found: Array<{ docId: DocId; freq: number; fields: FieldName[] }> = [];

    for (const lead of lists[driver]?.postings ?? []) {
      const group: Posting[] = [];
      let complete = true;
      for (let k = 0; k < lists.length; k++) {
        const ps = lists[k]?.postings ?? [];
        let c = cursors[k] ?? 0;
        while (c < ps.length && compareDocIds(ps[c]?.docId ?? "", lead.docId) < 0) c++;
        cursors[k] = c;
        const p = ps[c];
        if (!p || p.docId !== lead.docId) {
          complete = false;
          break;
        }
        group.push(p);
      }
      if (!complete) continue;

      let freq = 0;
      const fields: FieldName[] = [];
      for (const occ of group[0]?.occurrences ?? []) {
        if (!this.fieldAllowed(occ.field)) continue;
        const others = group.map((p) => p.occurrences.find((o) => o.field === occ.field)?.positions);
        let inField = 0;
        for (const start of occ.positions) {
          const adjacent = offsets.every((off, k) => {
            const positions = others[k];
            return positions !== undefined && containsSorted(positions, start + off);
          });
          if (adjacent) inField++;
        }
        if (inField) {
          freq += inField * this.fieldWeight(occ.field);
          fields.push(occ.field);
        }
      }
      if (freq > 0) found.push({ docId: lead.docId, freq, fields });
    }

    const df = found.length;
    return found.map(({ docId, freq, fields }) => {
      const score = this.deps.ranker.scoreTerm(this.scoreInput(docId, freq, df));
      return this.opts.explain
        ? { docId, score, hits: fields.map((field) => ({ field, term: label })) }
        : { docId, score };
    });
  }

  private scorePostings(list: PostingsList, weight: number): DocMatch[] {
    const out: DocMatch[] = [];
    for (const p of list.postings) {
      let tf = 0;
      const hits: MatchHit[] = [];
      for (const occ of p.occurrences) {
        if (!this.fieldAllowed(occ.field)) continue;
        tf += occ.positions.length * this.fieldWeight(occ.field);
        if (this.opts.explain) hits.push({ field: occ.field, term: list.term });
      }
      if (tf <= 0) continue;

      const score = this.deps.ranker.scoreTerm(this.scoreInput(p.docId, tf, list.df)) * weight;
      out.push(this.opts.explain ? { docId: p.docId, score, hits } : { docId: p.docId, score });
    }
    return out;
  }

  private scoreInput(docId: DocId, tf: number, df: number) {
    return {
      tf,
      df,
      docCount: this.docCount,
      docLength: this.docLength(docId),
      avgDocLength: this.avgDocLength(),
    };
  }

  private fieldAllowed(field: FieldName): boolean {
    return !this.opts.fields || this.opts.fields.has(field);
  }

  private fieldWeight(field: FieldName): number {
    return this.deps.fieldWeights?.get(field) ?? 1;
  }

  private docLength(docId: DocId): number {
    const cached = this.lengths.get(docId);
    if (cached !== undefined) return cached;

    const record = this.opts.index.document(docId);
    let length = 0;
    if (record) {
      const fields = this.opts.fields;
      length = fields
        ? Object.entries(record.fieldLengths).reduce((n, [f, len]) => (fields.has(f) ? n + len : n), 0)
        : record.length;
    }
    this.lengths.set(docId, length);
    return length;
  }

  private avgDocLength(): number {
    if (this.avgLength !== undefined) return this.avgLength;
    const fields = this.opts.fields;
    if (!fields) {
      this.avgLength = this.opts.index.getStats().avgDocLen;
    } else {
      let total = 0;
      for (const record of this.opts.index.documents()) total += this.docLength(record.id);
      this.avgLength = this.docCount ? total / this.docCount : 0;
    }
    return this.avgLength;
  }
}

/**
 * Walks a query tree against one index version.
 *
 * - term: synonyms, then fuzzy expansion, then union of postings
 * - phrase: same-field adjacency
 * - prefix: dictionary prefix scan
 * - and / or / not: linear merges of docId-ordered lists
 */
export class QueryEvaluator {
  constructor(private readonly deps: QueryEvaluatorDeps) {}

  /** Matching documents in docId order, with their scores. */
  async collect(root: QueryNode, options: EvaluateOptions): Promise<DocMatches> {
    validateNegations(root, options.query ?? "");
    const run = new Evaluation(this.deps, options);
    checkCancelled(options.signal);

    if (root.kind !== "and" && root.kind !== "or") return run.lower(root) ?? [];

    const clauses: Clause[] = [];
    for (let i = 0; i < root.children.length; i++) {
      const child = root.children[i];
      if (!child) continue;
      if (i > 0) {
        // let other work (and abort signals) in between top-level clauses
        await yieldToEventLoop();
        checkCancelled(options.signal);
      }
      clauses.push(run.clause(child));
    }

    const result = root.kind === "and" ? run.and(clauses) : run.or(clauses.map((c) => c.matches));
    return result ?? [];
  }

  /** Ranked results: score descending, ties by ascending docId. */
  async evaluate(root: QueryNode, options: EvaluateOptions): Promise<ScoredResult[]> {
    const matches = await this.collect(root, options);
    return matches
      .map((m) => toScoredResult(m, options.explain ?? false))
      .sort(compareResults);
  }
}

function checkCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new SearchCancelledError(signal.reason);
}
