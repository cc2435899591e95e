export interface TrieEntry<V> {
  key: string;
  value: V;
}

export interface TriePrefixResult {
  term: string;
  /** optional score (e.g. document frequency) */
  weight?: number;
}

/**
 * Persistent prefix trie.
 *
 * Updates never touch the receiver: `set` and `delete` return a new trie that
 * shares every untouched subtree with the old one. Iteration is in UTF-16
 * code-unit order, the same order as `<` on strings.
 */
export interface Trie<V> {
  readonly size: number;

  get(key: string): V | undefined;
  has(key: string): boolean;

  set(key: string, value: V): Trie<V>;
  delete(key: string): Trie<V>;

  /** Entries whose key starts with `prefix` (all entries for ""). */
  entries(prefix?: string): IterableIterator<TrieEntry<V>>;
  keys(prefix?: string): IterableIterator<string>;

  /** Returns up to `limit` keys sharing the prefix, best weight first. */
  complete(prefix: string, limit: number, weight?: (value: V) => number): TriePrefixResult[];
}
