// Rotating view over a fixed backing list; scrolling wraps around without copying rows.
export class CircularWindow<T> {
  private readonly items: readonly T[];
  private idx = 0;

  constructor(items: readonly T[]) {
    this.items = items;
  }

  get size(): number {
    return this.items.length;
  }

  /** Backing position of the first logical element */
  get index(): number {
    return this.idx;
  }

  get elements(): readonly T[] {
    return this.items;
  }

  // k logical elements from the rotation offset; repeats when k > size
  view(k: number): T[] {
    const n = this.items.length;
    if (n === 0 || k <= 0) return [];
    const out: T[] = [];
    for (let i = 0; i < k; i++) {
      out.push(this.items[(this.idx + i) % n]);
    }
    return out;
  }

  shift(steps: number): void {
    const n = this.items.length;
    if (n === 0) return;
    // JS % keeps the dividend's sign, fold negatives back into [0, n)
    this.idx = (((this.idx + steps) % n) + n) % n;
  }
}
