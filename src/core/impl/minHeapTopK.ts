import type { Comparator, Heap, TopKSelector } from "../heap.js";

class ArrayHeap<T> implements Heap<T> {
  private items: T[] = [];

  constructor(private readonly before: Comparator<T>) {}

  get size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(item: T): void {
    this.items.push(item);
    this.bubbleUp(this.items.length - 1);
  }

  replaceTop(item: T): T | undefined {
    const top = this.items[0];
    if (top === undefined) {
      this.push(item);
      return undefined;
    }
    this.items[0] = item;
    this.sinkDown(0);
    return top;
  }

  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  private precedes(i: number, j: number): boolean {
    const x = this.items[i];
    const y = this.items[j];
    return x !== undefined && y !== undefined && this.before(x, y) < 0;
  }

  private exchange(i: number, j: number): void {
    const x = this.items[i];
    const y = this.items[j];
    if (x === undefined || y === undefined) return;
    this.items[i] = y;
    this.items[j] = x;
  }

  private bubbleUp(i: number): void {
    for (let parent = (i - 1) >> 1; i > 0 && this.precedes(i, parent); parent = (i - 1) >> 1) {
      this.exchange(i, parent);
      i = parent;
    }
  }

  private sinkDown(i: number): void {
    const n = this.items.length;
    for (;;) {
      let next = i;
      for (const child of [2 * i + 1, 2 * i + 2]) {
        if (child < n && this.precedes(child, next)) next = child;
      }
      if (next === i) return;
      this.exchange(i, next);
      i = next;
    }
  }
}

/**
 * Bounded heap selection: O(n log k) instead of sorting all n matches.
 * The heap is ordered worst-first so the candidate to evict is always on top.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const heap = new ArrayHeap<T>((a, b) => comparator(b, a));
    for (const item of items) {
      if (heap.size < k) {
        heap.push(item);
        continue;
      }
      const weakest = heap.peek();
      if (weakest !== undefined && comparator(item, weakest) < 0) heap.replaceTop(item);
    }

    return heap.drain().sort(comparator);
  }

  page(items: Iterable<T>, offset: number, limit: number, comparator: Comparator<T>): T[] {
    if (limit <= 0) return [];
    return this.topK(items, offset + limit, comparator).slice(offset);
  }
}
