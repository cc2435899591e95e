export type Comparator<T> = (a: T, b: T) => number;

/**
 * Binary heap ordered by `before`: the item that sorts first sits at the top.
 * The top-K selector uses it with an inverted comparator so the top holds the
 * weakest of the kept items.
 */
export interface Heap<T> {
  readonly size: number;
  peek(): T | undefined;
  push(item: T): void;
  /** Swaps the top for `item` and restores heap order; returns the old top. */
  replaceTop(item: T): T | undefined;
  /** Empties the heap (order implementation-defined). */
  drain(): T[];
}

export interface TopKSelector<T> {
  /** The `k` best items in comparator order (Array.sort semantics: <0 means a first). */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];

  /** Items `offset .. offset + limit` of the full ordering, without sorting everything. */
  page(items: Iterable<T>, offset: number, limit: number, comparator: Comparator<T>): T[];
}
