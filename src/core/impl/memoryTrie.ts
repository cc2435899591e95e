import type { Trie, TrieEntry, TriePrefixResult } from "../trie.js";

type Node<V> = {
  readonly children: ReadonlyMap<string, Node<V>>;
  /** child keys in ascending order, kept alongside the map for ordered walks */
  readonly order: readonly string[];
  /** present when a key ends at this node */
  readonly entry: { readonly value: V } | undefined;
};

const EMPTY_CHILDREN: ReadonlyMap<string, never> = new Map<string, never>();

function makeNode<V>(
  children: ReadonlyMap<string, Node<V>> = EMPTY_CHILDREN,
  order: readonly string[] = [],
  entry?: { readonly value: V },
): Node<V> {
  return { children, order, entry };
}

function isEmpty<V>(node: Node<V>): boolean {
  return node.entry === undefined && node.children.size === 0;
}

function insertSorted(order: readonly string[], ch: string): string[] {
  let lo = 0;
  let hi = order.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if ((order[mid] ?? "") < ch) lo = mid + 1;
    else hi = mid;
  }
  const out = order.slice();
  out.splice(lo, 0, ch);
  return out;
}

function withChild<V>(node: Node<V>, ch: string, child: Node<V> | undefined): Node<V> {
  const children = new Map(node.children);
  let order = node.order;
  if (child) {
    if (!children.has(ch)) order = insertSorted(order, ch);
    children.set(ch, child);
  } else {
    children.delete(ch);
    order = order.filter((k) => k !== ch);
  }
  return makeNode(children, order, node.entry);
}

/**
 * Path-copying trie. An update copies the nodes on the key's path and shares
 * everything else, so older versions stay valid for readers that hold them.
 */
export class MemoryTrie<V> implements Trie<V> {
  private constructor(
    private readonly root: Node<V>,
    readonly size: number,
  ) {}

  static empty<V>(): MemoryTrie<V> {
    return new MemoryTrie<V>(makeNode<V>(), 0);
  }

  static from<V>(entries: Iterable<readonly [string, V]>): MemoryTrie<V> {
    let trie = MemoryTrie.empty<V>();
    for (const [key, value] of entries) trie = trie.set(key, value);
    return trie;
  }

  get(key: string): V | undefined {
    return this.find(key)?.entry?.value;
  }

  has(key: string): boolean {
    return this.find(key)?.entry !== undefined;
  }

  set(key: string, value: V): MemoryTrie<V> {
    let added = false;
    const put = (node: Node<V>, i: number): Node<V> => {
      if (i === key.length) {
        if (!node.entry) added = true;
        return makeNode(node.children, node.order, { value });
      }
      const ch = key[i] ?? "";
      const next = node.children.get(ch) ?? makeNode<V>();
      return withChild(node, ch, put(next, i + 1));
    };

    const root = put(this.root, 0);
    return new MemoryTrie(root, added ? this.size + 1 : this.size);
  }

  delete(key: string): MemoryTrie<V> {
    if (!this.has(key)) return this;

    const drop = (node: Node<V>, i: number): Node<V> | undefined => {
      let updated: Node<V>;
      if (i === key.length) {
        updated = makeNode(node.children, node.order);
      } else {
        const ch = key[i] ?? "";
        const child = node.children.get(ch);
        if (!child) return node;
        updated = withChild(node, ch, drop(child, i + 1));
      }
      // prune nodes that no longer lead to any key
      return isEmpty(updated) ? undefined : updated;
    };

    return new MemoryTrie(drop(this.root, 0) ?? makeNode<V>(), this.size - 1);
  }

  *entries(prefix = ""): IterableIterator<TrieEntry<V>> {
    const start = this.find(prefix);
    if (!start) return;

    const stack: Array<{ node: Node<V>; key: string }> = [{ node: start, key: prefix }];
    while (stack.length) {
      const top = stack.pop();
      if (!top) break;
      const { node, key } = top;
      if (node.entry) yield { key, value: node.entry.value };

      // push children in reverse order so pop() yields them ascending
      for (let i = node.order.length - 1; i >= 0; i--) {
        const ch = node.order[i] ?? "";
        const child = node.children.get(ch);
        if (child) stack.push({ node: child, key: key + ch });
      }
    }
  }

  *keys(prefix = ""): IterableIterator<string> {
    for (const e of this.entries(prefix)) yield e.key;
  }

  complete(prefix: string, limit: number, weight?: (value: V) => number): TriePrefixResult[] {
    if (limit <= 0) return [];

    const out: TriePrefixResult[] = [];
    for (const { key, value } of this.entries(prefix)) {
      out.push({ term: key, weight: weight ? weight(value) : undefined });
    }

    // prefer higher weight; entries() already yields keys ascending
    out.sort((a, b) => (b.weight ?? 0) - (a.weight ?? 0) || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0));
    return out.slice(0, limit);
  }

  private find(key: string): Node<V> | undefined {
    let cur: Node<V> | undefined = this.root;
    for (let i = 0; i < key.length && cur; i++) {
      cur = cur.children.get(key[i] ?? "");
    }
    return cur;
  }
}
