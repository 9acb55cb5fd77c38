/**
 * Serializes async critical sections per key. Tasks sharing a key run one at a
 * time in submission order; tasks under different keys run independently.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();
  private peakQueued = 0;
  private readonly queued = new Map<string, number>();

  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(settled, settled);
    this.tails.set(key, tail);
    this.track(key, 1);

    try {
      return await result;
    } finally {
      this.track(key, -1);
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  getPeakQueued(): number {
    return this.peakQueued;
  }

  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all([...this.tails.values()]);
    }
  }

  private track(key: string, delta: number): void {
    const next = (this.queued.get(key) ?? 0) + delta;
    if (next <= 0) {
      this.queued.delete(key);
    } else {
      this.queued.set(key, next);
    }
    if (next > this.peakQueued) {
      this.peakQueued = next;
    }
  }
}

function settled(): void {}
