// Async mutual exclusion: background refresh of the last panel vs. external commands.
// Waiters run in arrival order.
export class ExclusiveGuard {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get locked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const prev = this.tail;
    this.tail = prev.then(() => turn);
    this.holders++;
    try {
      await prev;
      return await fn();
    } finally {
      this.holders--;
      release();
    }
  }
}
