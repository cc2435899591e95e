import { z } from "zod";

import { IndexCorruptionError, toIssues } from "../errors.js";
import type { IndexReader } from "../invertedIndex.js";
import type { Term } from "../types.js";
import { DocIdSchema, FieldNameSchema, TermSchema } from "./documentSchemas.js";

export const SNAPSHOT_FORMAT = "search-core.snapshot";
export const SNAPSHOT_VERSION = 1;

const FieldOccurrenceSchema = z.object({
  field: FieldNameSchema,
  positions: z.array(z.number().int().nonnegative()).min(1),
});

const PostingSchema = z.object({
  docId: DocIdSchema,
  tf: z.number().int().positive(),
  occurrences: z.array(FieldOccurrenceSchema).min(1),
});

export const IndexSnapshotSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  version: z.literal(SNAPSHOT_VERSION),
  documents: z.array(
    z.object({
      id: DocIdSchema,
      fieldLengths: z.record(FieldNameSchema, z.number().int().nonnegative()),
    }),
  ),
  terms: z.array(
    z.object({
      term: TermSchema,
      postings: z.array(PostingSchema).min(1),
    }),
  ),
  synonyms: z.array(z.array(TermSchema).min(2)),
});

/** JSON-serializable image of one index version plus its synonym classes. */
export type IndexSnapshot = z.infer<typeof IndexSnapshotSchema>;

export function encodeSnapshot(index: IndexReader, synonyms: readonly (readonly Term[])[]): IndexSnapshot {
  const documents: IndexSnapshot["documents"] = [];
  for (const doc of index.documents()) {
    documents.push({ id: doc.id, fieldLengths: { ...doc.fieldLengths } });
  }

  const terms: IndexSnapshot["terms"] = [];
  for (const term of index.terms()) {
    const list = index.postingsFor(term);
    if (!list) continue;
    terms.push({
      term,
      postings: list.postings.map((p) => ({
        docId: p.docId,
        tf: p.tf,
        occurrences: p.occurrences.map((o) => ({ field: o.field, positions: o.positions.slice() })),
      })),
    });
  }

  return {
    format: SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    documents,
    terms,
    synonyms: synonyms.map((c) => c.slice()),
  };
}

function firstDuplicate(values: Iterable<string>): string | undefined {
  const seen = new Set<string>();
  for (const v of values) {
    if (seen.has(v)) return v;
    seen.add(v);
  }
  return undefined;
}

/**
 * Validates the shape of a snapshot. Structural index invariants (ordering of
 * postings, fields and positions, tf, dangling ids and fields) are checked by
 * the index itself on restore.
 */
export function decodeSnapshot(data: unknown): IndexSnapshot {
  const result = IndexSnapshotSchema.safeParse(data);
  if (!result.success) {
    throw new IndexCorruptionError("malformed snapshot", { issues: toIssues(result.error.issues) });
  }
  const snapshot = result.data;

  const dupTerm = firstDuplicate(snapshot.terms.map((t) => t.term));
  if (dupTerm !== undefined) throw new IndexCorruptionError("duplicate term in snapshot", { term: dupTerm });

  const dupDoc = firstDuplicate(snapshot.documents.map((d) => d.id));
  if (dupDoc !== undefined) throw new IndexCorruptionError("duplicate document in snapshot", { docId: dupDoc });

  // synonym classes must be disjoint, each with two distinct members
  const members = new Set<Term>();
  for (const cls of snapshot.synonyms) {
    const distinct = new Set(cls);
    if (distinct.size < 2) throw new IndexCorruptionError("synonym class with fewer than two terms", { members: cls });
    for (const m of distinct) {
      if (members.has(m)) throw new IndexCorruptionError("synonym term in more than one class", { term: m });
      members.add(m);
    }
  }

  return snapshot;
}
