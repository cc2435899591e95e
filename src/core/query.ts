/**
 * Parsed query tree. Nodes are frozen by the parser and live for one
 * evaluation. `position` is the character offset of the clause in the query.
 */

export interface TermNode {
  readonly kind: "term";
  readonly text: string;
  readonly position: number;
}

export interface PhraseNode {
  readonly kind: "phrase";
  /** whitespace-separated words between the quotes, in order */
  readonly words: readonly string[];
  readonly position: number;
}

export interface PrefixNode {
  readonly kind: "prefix";
  /** the word without its trailing `*` */
  readonly prefix: string;
  readonly position: number;
}

export interface AndNode {
  readonly kind: "and";
  readonly children: readonly QueryNode[];
  readonly position: number;
}

export interface OrNode {
  readonly kind: "or";
  readonly children: readonly QueryNode[];
  readonly position: number;
}

export interface NotNode {
  readonly kind: "not";
  readonly child: QueryNode;
  readonly position: number;
}

export type QueryNode = TermNode | PhraseNode | PrefixNode | AndNode | OrNode | NotNode;

export type QueryNodeKind = QueryNode["kind"];
