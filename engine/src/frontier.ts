// engine/src/frontier.ts
//
// "Pop next candidate" capability shared by the strategies. The priority
// argument is ignored by the stack and the queue.

import type { CellId } from './types.js';

export interface Frontier {
  readonly size: number;
  push(cell: CellId, priority: number): void;
  pop(): CellId | undefined;
  peek(): CellId | undefined;
  /** Distinct cells currently held, in pop order where the structure allows. */
  cells(): Set<CellId>;
}

export class StackFrontier implements Frontier {
  private a: CellId[] = [];

  get size(): number {
    return this.a.length;
  }
  push(cell: CellId): void {
    this.a.push(cell);
  }
  pop(): CellId | undefined {
    return this.a.pop();
  }
  peek(): CellId | undefined {
    return this.a[this.a.length - 1];
  }
  cells(): Set<CellId> {
    return new Set([...this.a].reverse());
  }
  /** Bottom-to-top copy; for DFS this is the active path. */
  toArray(): CellId[] {
    return [...this.a];
  }
}

// Head index instead of shift() so dequeue stays O(1).
export class QueueFrontier implements Frontier {
  private a: CellId[] = [];
  private head = 0;

  get size(): number {
    return this.a.length - this.head;
  }
  push(cell: CellId): void {
    this.a.push(cell);
  }
  pop(): CellId | undefined {
    if (this.head >= this.a.length) return undefined;
    const v = this.a[this.head++];
    if (this.head > 1024 && this.head * 2 > this.a.length) {
      this.a = this.a.slice(this.head);
      this.head = 0;
    }
    return v;
  }
  peek(): CellId | undefined {
    return this.head < this.a.length ? this.a[this.head] : undefined;
  }
  cells(): Set<CellId> {
    return new Set(this.a.slice(this.head));
  }
}

type HeapEntry = { k: number; order: number; v: CellId };

// Binary min-heap. Equal keys pop in insertion order.
export class PriorityFrontier implements Frontier {
  private a: HeapEntry[] = [];
  private counter = 0;

  get size(): number {
    return this.a.length;
  }
  push(cell: CellId, priority: number): void {
    this.a.push({ k: priority, order: this.counter++, v: cell });
    this.bubbleUp(this.a.length - 1);
  }
  pop(): CellId | undefined {
    const top = this.a[0];
    const last = this.a.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.a.length) {
      this.a[0] = last;
      this.bubbleDown(0);
    }
    return top.v;
  }
  peek(): CellId | undefined {
    return this.a[0]?.v;
  }
  peekKey(): number | undefined {
    return this.a[0]?.k;
  }
  cells(): Set<CellId> {
    const sorted = [...this.a].sort((p, q) => (p.k - q.k) || (p.order - q.order));
    return new Set(sorted.map((e) => e.v));
  }

  private less(i: number, j: number): boolean {
    const p = this.a[i];
    const q = this.a[j];
    return p.k < q.k || (p.k === q.k && p.order < q.order);
  }
  private bubbleUp(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(i, p)) break;
      [this.a[p], this.a[i]] = [this.a[i], this.a[p]];
      i = p;
    }
  }
  private bubbleDown(i: number): void {
    const n = this.a.length;
    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let m = i;
      if (l < n && this.less(l, m)) m = l;
      if (r < n && this.less(r, m)) m = r;
      if (m === i) break;
      [this.a[m], this.a[i]] = [this.a[i], this.a[m]];
      i = m;
    }
  }
}
