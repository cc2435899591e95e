import { performance } from "node:perf_hooks";

import type { Logger } from "pino";
import { z } from "zod";

import {
  ConfigurationError,
  IngestError,
  InvalidArgumentError,
  toIssues,
  type ErrorCode,
  type Issue,
} from "../errors.js";
import type { TopKSelector } from "../heap.js";
import type { IndexStats, InvertedIndex } from "../invertedIndex.js";
import type { SynonymTable } from "../synonyms.js";
import type { Tokenizer } from "../tokenizer.js";
import type { TriePrefixResult } from "../trie.js";
import type { DocId, DocumentFields, DocumentInput, FieldName, ScoredResult, Term } from "../types.js";
import type { DocMatch } from "./docSet.js";
import { DocIdSchema, FieldNameSchema } from "./documentSchemas.js";
import { compareResults, toScoredResult, type QueryEvaluator } from "./queryEvaluator.js";
import { parseQuery } from "./queryParser.js";
import { analyze } from "./simpleTokenizer.js";
import { decodeSnapshot, encodeSnapshot, type IndexSnapshot } from "./snapshotCodec.js";

export interface SearchOptions {
  /** 0 disables fuzzy matching */
  maxFuzzyDistance?: number;
  fieldsToSearch?: readonly FieldName[] | ReadonlySet<FieldName>;
  limit?: number;
  offset?: number;
  /** attach matched terms per field to each hit */
  explain?: boolean;
  signal?: AbortSignal;
}

export interface SearchPage {
  hits: ScoredResult[];
  /** number of matching documents before paging */
  total: number;
  tookMs: number;
}

export interface IngestFailure {
  /** position of the document in the batch */
  index: number;
  id: DocId | undefined;
  code: ErrorCode;
  message: string;
  issues: Issue[];
}

export interface IngestReport {
  ingested: number;
  failures: IngestFailure[];
}

export interface EngineStats extends IndexStats {
  version: number;
  synonymClasses: number;
}

export interface EngineLimits {
  defaultLimit: number;
  maxLimit: number;
  /** largest accepted maxFuzzyDistance */
  maxFuzzyDistance: number;
}

export interface EngineDeps {
  tokenizer: Tokenizer;
  index: InvertedIndex;
  synonyms: SynonymTable;
  evaluator: QueryEvaluator;
  topK: TopKSelector<DocMatch>;
  logger: Logger;
  limits?: Partial<EngineLimits>;
}


const RecordDocumentSchema = z.object({
  id: DocIdSchema,
  fields: z.record(FieldNameSchema, z.string({ invalid_type_error: "field value must be a string" })),
});

const MapDocumentSchema = z.object({
  id: DocIdSchema,
  fields: z.map(FieldNameSchema, z.string({ invalid_type_error: "field value must be a string" })),
});

function searchOptionsSchema(limits: EngineLimits) {
  return z
    .object({
      maxFuzzyDistance: z.number().int().min(0).max(limits.maxFuzzyDistance).optional(),
      fieldsToSearch: z.union([z.array(FieldNameSchema), z.set(FieldNameSchema)]).optional(),
      limit: z.number().int().positive().max(limits.maxLimit).optional(),
      offset: z.number().int().min(0).optional(),
      explain: z.boolean().optional(),
      signal: z.instanceof(AbortSignal).optional(),
    })
    .strict();
}

/**
 * Public entry point of the search core.
 *
 * Writes (ingest, delete, synonym changes, restore) run synchronously and each
 * becomes visible through one atomic swap. A search pins the index version and
 * the synonym classes current when it starts, so writes that land while it is
 * suspended do not affect it.
 */
export class MemorySearchEngine {
  private readonly limits: EngineLimits;
  private readonly searchOptions: ReturnType<typeof searchOptionsSchema>;

  constructor(private readonly deps: EngineDeps) {
    this.limits = {
      defaultLimit: deps.limits?.defaultLimit ?? 10,
      maxLimit: deps.limits?.maxLimit ?? 1000,
      maxFuzzyDistance: deps.limits?.maxFuzzyDistance ?? 3,
    };
    this.searchOptions = searchOptionsSchema(this.limits);
  }

  /** Adds or replaces a document. Throws IngestError for a malformed payload. */
  ingest(id: DocId, fields: DocumentFields): void {
    const doc = this.validateDocument(id, fields);
    this.deps.index.addDocument(doc.id, doc.fields);
    this.deps.logger.debug({ docId: doc.id, version: this.deps.index.version }, "document ingested");
  }

  /** Ingests the valid documents of a batch in one swap and reports the rest. */
  ingestMany(docs: Iterable<DocumentInput>): IngestReport {
    const accepted: DocumentInput[] = [];
    const failures: IngestFailure[] = [];

    let index = 0;
    for (const doc of docs) {
      try {
        accepted.push(this.validateDocument(doc.id, doc.fields));
      } catch (err) {
        if (!(err instanceof IngestError)) throw err;
        failures.push({ index, id: err.documentId, code: err.code, message: err.message, issues: err.issues });
      }
      index++;
    }

    if (accepted.length) this.deps.index.addDocuments(accepted);
    if (failures.length) {
      this.deps.logger.warn({ rejected: failures.length, failures }, "documents rejected from batch");
    }
    this.deps.logger.debug({ ingested: accepted.length, version: this.deps.index.version }, "batch ingested");
    return { ingested: accepted.length, failures };
  }

  /** Removes a document; unknown ids are ignored. Returns whether it existed. */
  delete(id: DocId): boolean {
    if (typeof id !== "string" || !this.deps.index.document(id)) return false;
    this.deps.index.removeDocument(id);
    this.deps.logger.debug({ docId: id, version: this.deps.index.version }, "document deleted");
    return true;
  }

  has(id: DocId): boolean {
    return this.deps.index.document(id) !== undefined;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchPage> {
    const started = performance.now();
    if (typeof query !== "string") {
      throw new InvalidArgumentError("query must be a string", [{ path: "$", message: "expected a string" }]);
    }

    const parsed = this.searchOptions.safeParse(options);
    if (!parsed.success) {
      throw new InvalidArgumentError("invalid search options", toIssues(parsed.error.issues));
    }
    const opts = parsed.data;
    const explain = opts.explain ?? false;

    const root = parseQuery(query);
    const matches = await this.deps.evaluator.collect(root, {
      index: this.deps.index.snapshot(),
      synonyms: this.deps.synonyms.snapshot(),
      maxFuzzyDistance: opts.maxFuzzyDistance ?? 0,
      fields: opts.fieldsToSearch && new Set(opts.fieldsToSearch),
      explain,
      signal: opts.signal,
      query,
    });

    const page = this.deps.topK.page(matches, opts.offset ?? 0, opts.limit ?? this.limits.defaultLimit, compareResults);
    const hits = page.map((m) => toScoredResult(m, explain));
    const tookMs = performance.now() - started;

    this.deps.logger.debug({ query, total: matches.length, returned: hits.length, tookMs }, "search");
    return { hits, total: matches.length, tookMs };
  }

  /**
   * Declares a set of words equivalent at query time. Members go through the
   * tokenizer first, so each must normalize to exactly one term.
   */
  defineSynonymClass(members: Iterable<string>): Term[] {
    const terms = this.normalizeClass(Array.from(members), 0);
    this.deps.synonyms.defineClass(terms);
    this.deps.logger.info({ terms }, "synonym class defined");
    return terms;
  }

  /** Removes the class containing `word`. */
  removeSynonymClass(word: string): boolean {
    const tokens = analyze(this.deps.tokenizer, word, { removeStopWords: false });
    const term = tokens[0]?.term;
    if (tokens.length !== 1 || term === undefined) return false;

    const removed = this.deps.synonyms.removeClass(term);
    if (removed) this.deps.logger.info({ term }, "synonym class removed");
    return removed;
  }

  /** Replaces every synonym class; used for classes coming from configuration. */
  replaceSynonymClasses(classes: ReadonlyArray<Iterable<string>>): void {
    const normalized = classes.map((members, i) => this.normalizeClass(Array.from(members), i));
    this.deps.synonyms.replaceAll(normalized);
    this.deps.logger.info({ classes: normalized.length }, "synonym classes replaced");
  }

  synonymClasses(): Term[][] {
    return this.deps.synonyms.classes();
  }

  /** Indexed terms starting with `prefix`, most frequent first. */
  suggest(prefix: string, limit = 10): TriePrefixResult[] {
    if (typeof prefix !== "string" || !Number.isInteger(limit) || limit <= 0) {
      throw new InvalidArgumentError("suggest needs a string prefix and a positive integer limit");
    }
    const tokens = analyze(this.deps.tokenizer, prefix, { stem: false, removeStopWords: false });
    const term = tokens[0]?.term;
    if (tokens.length !== 1 || term === undefined) return [];
    return this.deps.index.snapshot().completeTerm(term, limit);
  }

  stats(): EngineStats {
    const index = this.deps.index.snapshot();
    return {
      ...index.getStats(),
      version: index.version,
      synonymClasses: this.deps.synonyms.classes().length,
    };
  }

  exportSnapshot(): IndexSnapshot {
    return encodeSnapshot(this.deps.index.snapshot(), this.deps.synonyms.classes());
  }

  /**
   * Replaces the whole index and the synonym classes with a snapshot. The
   * snapshot is fully validated first; on failure nothing changes.
   */
  restoreSnapshot(data: unknown): void {
    const snapshot = decodeSnapshot(data);
    this.deps.index.restore({ documents: snapshot.documents, postings: snapshot.terms });
    this.deps.synonyms.replaceAll(snapshot.synonyms);

    const stats = this.deps.index.getStats();
    this.deps.logger.info(
      { docCount: stats.docCount, termCount: stats.termCount, version: this.deps.index.version },
      "snapshot restored",
    );
  }

  private validateDocument(id: unknown, fields: unknown): DocumentInput {
    const schema = fields instanceof Map ? MapDocumentSchema : RecordDocumentSchema;
    const result = schema.safeParse({ id, fields });
    if (!result.success) {
      const issues = toIssues(result.error.issues);
      const docId = typeof id === "string" ? id : undefined;
      throw new IngestError(
        `invalid document${docId ? ` "${docId}"` : ""}: ${issues.map((i) => `${i.path} ${i.message}`).join("; ")}`,
        docId,
        issues,
      );
    }
    return result.data;
  }

  private normalizeClass(members: readonly string[], index: number): Term[] {
    const issues: Issue[] = [];
    const terms: Term[] = [];

    members.forEach((member, i) => {
      const tokens = typeof member === "string" ? analyze(this.deps.tokenizer, member, { removeStopWords: false }) : [];
      const term = tokens[0]?.term;
      if (tokens.length !== 1 || term === undefined) {
        issues.push({ path: `$[${index}][${i}]`, message: "member must normalize to exactly one term" });
      } else {
        terms.push(term);
      }
    });

    if (issues.length) throw new ConfigurationError("invalid synonym class", issues);
    return terms;
  }
}
