import type { Term } from "./types.js";

/** Read side of a synonym table; what a single query evaluation consults. */
export interface SynonymLookup {
  classOf(term: Term): ReadonlySet<Term> | undefined;
  /** The term itself plus every other member of its class. */
  expand(term: Term): Term[];
}

/**
 * Disjoint synonym classes over normalized terms.
 *
 * A term belongs to at most one class; `defineClass` rejects overlaps with a
 * ConfigurationError and registers nothing in that case.
 */
export interface SynonymTable extends SynonymLookup {
  defineClass(members: Iterable<Term>): void;
  removeClass(term: Term): boolean;
  replaceAll(classes: Iterable<Iterable<Term>>): void;
  classes(): Term[][];
  snapshot(): SynonymLookup;
}
