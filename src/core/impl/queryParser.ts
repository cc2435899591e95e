import { QuerySyntaxError } from "../errors.js";
import type { AndNode, NotNode, OrNode, PhraseNode, PrefixNode, QueryNode, TermNode } from "../query.js";

type Lexeme =
  | { type: "word"; text: string; pos: number }
  | { type: "phrase"; text: string; pos: number }
  | { type: "minus"; pos: number }
  | { type: "pipe"; pos: number }
  | { type: "lparen"; pos: number }
  | { type: "rparen"; pos: number };

const SEARCHABLE = /[\p{L}\p{N}]/u;
const WHITESPACE = /\s/u;

function isWordChar(ch: string): boolean {
  return !WHITESPACE.test(ch) && ch !== '"' && ch !== "|" && ch !== "(" && ch !== ")";
}

function lex(query: string): Lexeme[] {
  const out: Lexeme[] = [];
  const n = query.length;
  let i = 0;

  while (i < n) {
    const ch = query[i] ?? "";
    if (WHITESPACE.test(ch)) {
      i++;
      continue;
    }

    if (ch === '"') {
      const close = query.indexOf('"', i + 1);
      if (close < 0) throw new QuerySyntaxError("unterminated phrase", query, i);
      out.push({ type: "phrase", text: query.slice(i + 1, close), pos: i });
      i = close + 1;
      continue;
    }

    if (ch === "|") {
      out.push({ type: "pipe", pos: i });
      i++;
      continue;
    }
    if (ch === "(") {
      out.push({ type: "lparen", pos: i });
      i++;
      continue;
    }
    if (ch === ")") {
      out.push({ type: "rparen", pos: i });
      i++;
      continue;
    }

    // a leading '-' negates the clause that follows it directly
    if (ch === "-") {
      const next = query[i + 1];
      if (next === undefined || WHITESPACE.test(next) || next === "|" || next === ")") {
        throw new QuerySyntaxError("negation must be followed by a clause", query, i);
      }
      out.push({ type: "minus", pos: i });
      i++;
      continue;
    }

    const start = i;
    while (i < n && isWordChar(query[i] ?? "")) i++;
    out.push({ type: "word", text: query.slice(start, i), pos: start });
  }

  return out;
}

function freeze<T extends QueryNode>(node: T): T {
  return Object.freeze(node);
}

/**
 * Recursive-descent parser over the lexeme stream.
 *
 *   or     := and ('|' and)*
 *   and    := clause+
 *   clause := '-'? (group | phrase | word)
 *   group  := '(' or ')'
 */
class Parser {
  private i = 0;

  constructor(
    private readonly query: string,
    private readonly lexemes: Lexeme[],
  ) {}

  parse(): QueryNode {
    const node = this.parseOr();
    const extra = this.peek();
    if (extra) {
      // only a stray ')' can stop parseOr early
      throw this.error("unbalanced ')'", extra.pos);
    }
    return node;
  }

  private parseOr(): QueryNode {
    const first = this.peek();
    const position = first?.pos ?? this.query.length;
    if (first?.type === "pipe") throw this.error("expected a clause before '|'", first.pos);

    const children: QueryNode[] = [this.parseAnd()];
    while (this.peek()?.type === "pipe") {
      const pipe = this.next();
      const after = this.peek();
      if (!after || after.type === "pipe" || after.type === "rparen") {
        throw this.error("expected a clause after '|'", pipe?.pos ?? this.query.length);
      }
      children.push(this.parseAnd());
    }

    const only = children[0];
    if (children.length === 1 && only) return only;
    return freeze<OrNode>({ kind: "or", children: Object.freeze(children), position });
  }

  private parseAnd(): QueryNode {
    const first = this.peek();
    const position = first?.pos ?? this.query.length;
    if (first?.type === "rparen") throw this.error("unbalanced ')'", first.pos);
    const children: QueryNode[] = [];

    for (let lx = this.peek(); lx && lx.type !== "pipe" && lx.type !== "rparen"; lx = this.peek()) {
      children.push(this.parseClause());
    }

    const only = children[0];
    if (!only) throw this.error("expected a clause", position);
    if (children.length === 1) return only;
    return freeze<AndNode>({ kind: "and", children: Object.freeze(children), position });
  }

  private parseClause(): QueryNode {
    const lx = this.next();
    if (!lx) throw this.error("expected a clause", this.query.length);

    switch (lx.type) {
      case "minus": {
        const target = this.peek();
        if (!target || target.type === "minus") {
          throw this.error("negation must be followed by a clause", lx.pos);
        }
        return freeze<NotNode>({ kind: "not", child: this.parseClause(), position: lx.pos });
      }
      case "lparen": {
        const inner = this.peek();
        if (inner?.type === "rparen") throw this.error("empty group", lx.pos);
        if (!inner) throw this.error("unbalanced '('", lx.pos);
        const node = this.parseOr();
        if (this.next()?.type !== "rparen") throw this.error("unbalanced '('", lx.pos);
        return node;
      }
      case "phrase":
        return this.phrase(lx.text, lx.pos);
      case "word":
        return this.word(lx.text, lx.pos);
      default:
        throw this.error(`unexpected '${this.query[lx.pos] ?? ""}'`, lx.pos);
    }
  }

  private phrase(text: string, pos: number): PhraseNode {
    const words = text.split(/\s+/u).filter(Boolean);
    if (!words.length) throw this.error("empty phrase", pos);
    if (!SEARCHABLE.test(text)) throw this.error("phrase has no searchable characters", pos);
    return freeze<PhraseNode>({ kind: "phrase", words: Object.freeze(words), position: pos });
  }

  private word(text: string, pos: number): TermNode | PrefixNode {
    const star = text.indexOf("*");
    if (star >= 0 && star !== text.length - 1) {
      throw this.error("'*' is only allowed at the end of a word", pos + star);
    }

    const body = star >= 0 ? text.slice(0, -1) : text;
    if (!body) throw this.error("prefix needs at least one character before '*'", pos);
    if (!SEARCHABLE.test(body)) throw this.error("term has no searchable characters", pos);

    return star >= 0
      ? freeze<PrefixNode>({ kind: "prefix", prefix: body, position: pos })
      : freeze<TermNode>({ kind: "term", text: body, position: pos });
  }

  private peek(): Lexeme | undefined {
    return this.lexemes[this.i];
  }

  private next(): Lexeme | undefined {
    return this.lexemes[this.i++];
  }

  private error(message: string, position: number): QuerySyntaxError {
    return new QuerySyntaxError(message, this.query, position);
  }
}

/**
 * Parses a query string into a frozen query tree. Pure; throws
 * QuerySyntaxError with the offending position for malformed input.
 */
export function parseQuery(query: string): QueryNode {
  if (!query.trim()) throw new QuerySyntaxError("empty query", query, 0);
  return new Parser(query, lex(query)).parse();
}

/**
 * Checks that every negation sits directly inside an And with at least one
 * positive clause, so evaluating it never needs the full corpus.
 */
export function validateNegations(root: QueryNode, query = ""): void {
  const visit = (node: QueryNode, parent: QueryNode | undefined): void => {
    switch (node.kind) {
      case "not": {
        const ok = parent?.kind === "and" && parent.children.some((c) => c.kind !== "not");
        if (!ok) {
          throw new QuerySyntaxError("a negated clause needs a positive clause beside it", query, node.position);
        }
        visit(node.child, node);
        return;
      }
      case "and":
      case "or":
        for (const c of node.children) visit(c, node);
        return;
      default:
        return;
    }
  };
  visit(root, undefined);
}
