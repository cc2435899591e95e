import { ConfigurationError, type Issue } from "../errors.js";
import type { SynonymLookup, SynonymTable } from "../synonyms.js";
import type { Term } from "../types.js";

type ClassMap = ReadonlyMap<Term, ReadonlySet<Term>>;

class FrozenLookup implements SynonymLookup {
  constructor(private readonly byTerm: ClassMap) {}

  classOf(term: Term): ReadonlySet<Term> | undefined {
    return this.byTerm.get(term);
  }

  expand(term: Term): Term[] {
    const cls = this.byTerm.get(term);
    if (!cls) return [term];
    // the term first, then the rest of its class in order
    return [term, ...Array.from(cls).filter((t) => t !== term).sort()];
  }
}

function toClass(members: Iterable<Term>, index: number): { cls: ReadonlySet<Term>; issues: Issue[] } {
  const issues: Issue[] = [];
  const cls = new Set<Term>();
  let i = 0;
  for (const m of members) {
    if (typeof m !== "string" || m.length === 0) {
      issues.push({ path: `$[${index}][${i}]`, message: "member must be a non-empty term" });
    } else {
      cls.add(m);
    }
    i++;
  }
  if (!issues.length && cls.size < 2) {
    issues.push({ path: `$[${index}]`, message: "a synonym class needs at least two distinct terms" });
  }
  return { cls, issues };
}

/**
 * Synonym classes as a partition of part of the vocabulary.
 *
 * Every term maps to the (shared, frozen) set of its class. Writes build a new
 * map and swap it in, so a lookup handed out by `snapshot()` never changes.
 */
export class MemorySynonymTable implements SynonymTable {
  private byTerm: ClassMap = new Map();

  constructor(classes: Iterable<Iterable<Term>> = []) {
    this.replaceAll(classes);
  }

  classOf(term: Term): ReadonlySet<Term> | undefined {
    return this.byTerm.get(term);
  }

  expand(term: Term): Term[] {
    return new FrozenLookup(this.byTerm).expand(term);
  }

  defineClass(members: Iterable<Term>): void {
    const { cls, issues } = toClass(members, 0);
    if (issues.length) throw new ConfigurationError("invalid synonym class", issues);

    const overlap = Array.from(cls).filter((t) => this.byTerm.has(t)).sort();
    if (overlap.length) {
      throw new ConfigurationError(
        `synonym class overlaps an existing class: ${overlap.join(", ")}`,
        overlap.map((t) => ({ path: "$", message: `"${t}" already belongs to a class` })),
      );
    }

    const next = new Map(this.byTerm);
    for (const t of cls) next.set(t, cls);
    this.byTerm = next;
  }

  removeClass(term: Term): boolean {
    const cls = this.byTerm.get(term);
    if (!cls) return false;
    const next = new Map(this.byTerm);
    for (const t of cls) next.delete(t);
    this.byTerm = next;
    return true;
  }

  /** Replaces every class at once; on any error the table is left unchanged. */
  replaceAll(classes: Iterable<Iterable<Term>>): void {
    const next = new Map<Term, ReadonlySet<Term>>();
    const issues: Issue[] = [];
    let index = 0;

    for (const members of classes) {
      const { cls, issues: classIssues } = toClass(members, index);
      issues.push(...classIssues);
      for (const t of cls) {
        if (next.has(t)) issues.push({ path: `$[${index}]`, message: `"${t}" already belongs to a class` });
        else next.set(t, cls);
      }
      index++;
    }

    if (issues.length) throw new ConfigurationError("invalid synonym classes", issues);
    this.byTerm = next;
  }

  classes(): Term[][] {
    const seen = new Set<ReadonlySet<Term>>();
    const out: Term[][] = [];
    for (const cls of this.byTerm.values()) {
      if (seen.has(cls)) continue;
      seen.add(cls);
      out.push(Array.from(cls).sort());
    }
    return out.sort((a, b) => ((a[0] ?? "") < (b[0] ?? "") ? -1 : 1));
  }

  snapshot(): SynonymLookup {
    return new FrozenLookup(this.byTerm);
  }
}
