/**
 * Bounded min-heap for top-k selection.
 *
 * Holds at most `capacity` items. Once full, an offered item replaces the
 * current minimum only if it ranks higher, so after feeding n items the heap
 * contains the k highest-ranked ones at O(n log k) total cost.
 */

/**
 * Ordering function: negative when `a` ranks below `b`, positive when above.
 */
export type Comparator<T> = (a: T, b: T) => number;

export class BoundedMinHeap<T> {
  private readonly items: T[] = [];

  constructor(
    private readonly capacity: number,
    private readonly compare: Comparator<T>
  ) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Heap capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Lowest-ranked item held, or undefined when empty.
   */
  peek(): T | undefined {
    return this.items[0];
  }

  /**
   * Offer an item. Returns true if the heap kept it.
   */
  offer(item: T): boolean {
    if (this.capacity === 0) {
      return false;
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.siftUp(this.items.length - 1);
      return true;
    }

    const min = this.items[0];
    if (min === undefined || this.compare(item, min) <= 0) {
      return false;
    }

    this.items[0] = item;
    this.siftDown(0);
    return true;
  }

  /**
   * Remove and return the lowest-ranked item.
   */
  poll(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this.items.length > 0) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /**
   * Empty the heap, returning its items highest-ranked first.
   */
  drainDescending(): T[] {
    const result: T[] = new Array<T>(this.items.length);
    for (let i = this.items.length - 1; i >= 0; i--) {
      const item = this.poll();
      if (item === undefined) {
        break;
      }
      result[i] = item;
    }
    return result;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.swapIfBelow(child, parent)) {
        return;
      }
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const length = this.items.length;

    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let smallest = parent;

      if (left < length && this.ranksBelow(left, smallest)) {
        smallest = left;
      }
      if (right < length && this.ranksBelow(right, smallest)) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }

      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private ranksBelow(i: number, j: number): boolean {
    const a = this.items[i];
    const b = this.items[j];
    return a !== undefined && b !== undefined && this.compare(a, b) < 0;
  }

  private swapIfBelow(i: number, j: number): boolean {
    if (!this.ranksBelow(i, j)) {
      return false;
    }
    this.swap(i, j);
    return true;
  }

  private swap(i: number, j: number): void {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) {
      return;
    }
    this.items[i] = b;
    this.items[j] = a;
  }
}

/**
 * Select the `k` highest-ranked items, highest first.
 * Returns an empty array for `k <= 0`.
 *
 * @example
 *   selectTopK([3, 9, 1, 7], 2, (a, b) => a - b); // [9, 7]
 */
export function selectTopK<T>(items: Iterable<T>, k: number, compare: Comparator<T>): T[] {
  if (!(k > 0)) {
    return [];
  }

  const heap = new BoundedMinHeap<T>(Number.isFinite(k) ? Math.floor(k) : Number.MAX_SAFE_INTEGER, compare);
  for (const item of items) {
    heap.offer(item);
  }
  return heap.drainDescending();
}
