import { compareDocIds, type DocId, type FieldName, type Term } from "../types.js";

/** A term (or phrase) that contributed to a match, kept for explanations. */
export interface MatchHit {
  field: FieldName;
  term: Term;
}

export interface DocMatch {
  docId: DocId;
  score: number;
  hits?: readonly MatchHit[];
}

/**
 * Match lists are arrays of DocMatch ordered by ascending docId without
 * duplicates. Every combinator here is a single linear merge over its inputs.
 */
export type DocMatches = readonly DocMatch[];

function mergeHits(a: DocMatch, b: DocMatch): readonly MatchHit[] | undefined {
  if (!a.hits) return b.hits;
  if (!b.hits) return a.hits;
  return [...a.hits, ...b.hits];
}

function combine(a: DocMatch, b: DocMatch): DocMatch {
  const hits = mergeHits(a, b);
  return hits ? { docId: a.docId, score: a.score + b.score, hits } : { docId: a.docId, score: a.score + b.score };
}

/** Documents in both lists; scores add. */
export function intersect(a: DocMatches, b: DocMatches): DocMatch[] {
  const out: DocMatch[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const x = a[i];
    const y = b[j];
    if (!x || !y) break;
    const c = compareDocIds(x.docId, y.docId);
    if (c === 0) {
      out.push(combine(x, y));
      i++;
      j++;
    } else if (c < 0) {
      i++;
    } else {
      j++;
    }
  }
  return out;
}

/** Documents in either list; scores of shared documents add. */
export function union(a: DocMatches, b: DocMatches): DocMatch[] {
  const out: DocMatch[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    const x = a[i];
    const y = b[j];
    if (x && (!y || compareDocIds(x.docId, y.docId) < 0)) {
      out.push(x);
      i++;
    } else if (y && (!x || compareDocIds(y.docId, x.docId) < 0)) {
      out.push(y);
      j++;
    } else if (x && y) {
      out.push(combine(x, y));
      i++;
      j++;
    }
  }
  return out;
}

/** Documents of `a` that are not in `b`; scores of `a` are kept. */
export function difference(a: DocMatches, b: DocMatches): DocMatch[] {
  const out: DocMatch[] = [];
  let j = 0;
  for (const x of a) {
    while (j < b.length && compareDocIds(b[j]?.docId ?? "", x.docId) < 0) j++;
    const y = b[j];
    if (!y || y.docId !== x.docId) out.push(x);
  }
  return out;
}

/** Pairwise (tournament) union of many lists: O(n log k) for k lists. */
export function unionAll(lists: readonly DocMatches[]): DocMatches {
  if (lists.length === 0) return [];
  let level: DocMatches[] = lists.slice();
  while (level.length > 1) {
    const next: DocMatches[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const a = level[i] ?? [];
      const b = level[i + 1];
      next.push(b ? union(a, b) : a);
    }
    level = next;
  }
  return level[0] ?? [];
}

/** Intersection of many lists, smallest first; stops as soon as nothing is left. */
export function intersectAll(lists: readonly DocMatches[]): DocMatches {
  if (lists.length === 0) return [];
  const bySize = lists.slice().sort((a, b) => a.length - b.length);
  let acc: DocMatches = bySize[0] ?? [];
  for (let i = 1; i < bySize.length && acc.length; i++) {
    acc = intersect(acc, bySize[i] ?? []);
  }
  return acc;
}

/** True when the list is strictly ordered by docId. */
export function isOrdered(list: ReadonlyArray<{ docId: DocId }>): boolean {
  for (let i = 1; i < list.length; i++) {
    const prev = list[i - 1];
    const cur = list[i];
    if (!prev || !cur || compareDocIds(prev.docId, cur.docId) >= 0) return false;
  }
  return true;
}
