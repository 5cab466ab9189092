/**
 * Job queue.
 *
 * A binary min-heap of jobs ordered by (nextRun, id). A job's nextRun must
 * not change while it sits in the heap; the service pops it, fires it and
 * re-adds it with the new time.
 */

import type { ScheduledJob } from "./job.js";

export class HeapQueue<T> {
  private items: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  push(item: T): void {
    this.items.push(item);
    this.up(this.items.length - 1);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.down(0);
    }
    return top;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Remove and return every item matching `pred`. */
  removeWhere(pred: (item: T) => boolean): T[] {
    const removed = this.items.filter(pred);
    if (removed.length === 0) return removed;
    this.items = this.items.filter((item) => !pred(item));
    this.heapify();
    return removed;
  }

  toArray(): T[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }

  private heapify(): void {
    for (let i = Math.floor(this.items.length / 2) - 1; i >= 0; i--) this.down(i);
  }

  private up(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.items[i], this.items[parent])) return;
      this.swap(i, parent);
      i = parent;
    }
  }

  private down(i: number): void {
    const n = this.items.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(this.items[left], this.items[smallest])) smallest = left;
      if (right < n && this.less(this.items[right], this.items[smallest])) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = tmp;
  }
}

const earlier = (a: ScheduledJob, b: ScheduledJob): boolean =>
  a.nextRun < b.nextRun || (a.nextRun === b.nextRun && a.id < b.id);

export class JobQueue {
  private heap = new HeapQueue<ScheduledJob>(earlier);

  add(job: ScheduledJob): void {
    this.heap.push(job);
  }

  /** Pop every job due at or before `nowMs`, earliest first. */
  popDue(nowMs: number): ScheduledJob[] {
    const due: ScheduledJob[] = [];
    for (let next = this.heap.peek(); next && next.nextRun <= nowMs; next = this.heap.peek()) {
      this.heap.pop();
      due.push(next);
    }
    return due;
  }

  nextRunTime(): number | undefined {
    return this.heap.peek()?.nextRun;
  }

  remove(job: ScheduledJob): boolean {
    return this.heap.removeWhere((j) => j === job).length > 0;
  }

  removeOwner(owner: string): ScheduledJob[] {
    return this.heap.removeWhere((j) => j.owner === owner);
  }

  has(job: ScheduledJob): boolean {
    return this.heap.toArray().includes(job);
  }

  get size(): number {
    return this.heap.size;
  }

  clear(): void {
    this.heap.clear();
  }
}
