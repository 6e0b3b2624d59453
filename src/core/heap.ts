/**
 * Heap contract used for top-K selection.
 * `compare` follows Array.sort semantics; the item that sorts first sits at the top.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Drains the heap in comparator order. */
  drain(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns the first K items by comparator, sorted.
   * Comparator should behave like Array.sort: <0 means a before b.
   * Ties are resolved by the comparator alone, so it should define a total order.
   */
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[];
}
