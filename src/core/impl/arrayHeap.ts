import type { Heap } from "../heap.js";
import type { Equals, IsOrdered } from "../types.js";
import { asIndex } from "../validation.js";

function render(item: unknown): string {
  try {
    return String(item);
  } catch {
    // no usable toString/valueOf, e.g. Object.create(null)
    return Object.prototype.toString.call(item);
  }
}

/**
 * Array-backed binary heap over a caller-supplied ordering predicate.
 *
 * Children of position `i` live at `2i + 1` and `2i + 2`; every parent is
 * ordered before its children. Initial items go through `push` one at a time.
 */
export class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly isOrdered: IsOrdered<T>, items: Iterable<T> = []) {
    for (const item of items) this.push(item);
  }

  count(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  peekFirst(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    this.siftUp(this.data.length - 1);
  }

  pop(): T | undefined {
    const a = this.data;
    if (a.length <= 1) return a.pop();
    const top = a[0];
    a[0] = a.pop()!;
    this.siftDown(0);
    return top;
  }

  removeAt(index: number): T | undefined {
    const a = this.data;
    const i = asIndex(index, a.length);
    if (i === undefined) return undefined;
    if (i === a.length - 1) return a.pop();

    const removed = a[i];
    a[i] = a.pop()!;
    // the moved-in element may belong below or above `i`
    this.siftDown(i);
    this.siftUp(i);
    return removed;
  }

  replaceAt(index: number, value: T): T | undefined {
    if (asIndex(index, this.data.length) === undefined) return undefined;
    const removed = this.removeAt(index);
    this.push(value);
    return removed;
  }

  replaceFirst(value: T): T | undefined {
    return this.replaceAt(0, value);
  }

  removeAllElements(): void {
    this.data.length = 0;
  }

  contains(value: T, equals?: Equals<T>): boolean {
    return equals ? this.indexOf(value, equals) >= 0 : this.data.includes(value);
  }

  indexOf(value: T, equals?: Equals<T>): number {
    return equals ? this.data.findIndex((item) => equals(item, value)) : this.data.indexOf(value);
  }

  drain(visit: (item: T) => void): void {
    while (this.data.length) visit(this.pop()!);
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  toString(): string {
    return `Heap(${this.data.length})[${this.data.map(render).join(", ")}]`;
  }

  private siftUp(i: number): void {
    const a = this.data;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (this.isOrdered(a[p]!, a[i]!)) break;
      [a[i], a[p]] = [a[p]!, a[i]!];
      i = p;
    }
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      if (l >= n) return;
      const r = l + 1;
      const first = r < n && !this.isOrdered(a[l]!, a[r]!) ? r : l;
      if (this.isOrdered(a[i]!, a[first]!)) return;

      [a[i], a[first]] = [a[first]!, a[i]!];
      i = first;
    }
  }
}
