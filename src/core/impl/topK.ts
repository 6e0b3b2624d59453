import type { Heap, TopKSelector } from "../heap.js";

export class BinaryHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  pop(): T | undefined {
    const a = this.data;
    const top = a[0];
    const last = a.pop();
    if (a.length && last !== undefined) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  drain(): T[] {
    const out: T[] = [];
    for (let item = this.pop(); item !== undefined; item = this.pop()) out.push(item);
    return out;
  }

  private before(i: number, j: number): boolean {
    const a = this.data;
    const x = a[i];
    const y = a[j];
    return x !== undefined && y !== undefined && this.compare(x, y) < 0;
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    const tmp = a[i];
    const other = a[j];
    if (tmp === undefined || other === undefined) return;
    a[i] = other;
    a[j] = tmp;
  }

  private siftDown(i: number): void {
    const n = this.data.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let first = i;

      if (l < n && this.before(l, first)) first = l;
      if (r < n && this.before(r, first)) first = r;
      if (first === i) return;

      this.swap(i, first);
      i = first;
    }
  }
}

/**
 * Bounded heap selection of the best K items in O(n log k).
 *
 * The heap is ordered by the reversed comparator, so its top is the worst of
 * the current best K and is evicted when a better item arrives.
 */
export class HeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    const heap = new BinaryHeap<T>((a, b) => comparator(b, a));

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    return heap.drain().reverse();
  }
}
