interface Waiter {
  resolve: () => void;
}

/**
 * One serial lane per key. Work for a room runs in arrival order and never
 * overlaps; work for different rooms runs independently.
 */
export class SerialLanes {
  private readonly busy = new Set<string>();
  private readonly waiters = new Map<string, Waiter[]>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await task();
    } finally {
      this.release(key);
    }
  }

  private acquire(key: string): Promise<void> {
    if (!this.busy.has(key)) {
      this.busy.add(key);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const queue = this.waiters.get(key) ?? [];
      queue.push({ resolve });
      this.waiters.set(key, queue);
    });
  }

  // The slot passes straight to the next waiter, so `busy` stays set.
  private release(key: string): void {
    const queue = this.waiters.get(key);
    const next = queue?.shift();
    if (next) {
      if (queue && queue.length === 0) this.waiters.delete(key);
      next.resolve();
      return;
    }
    this.busy.delete(key);
  }

  isBusy(key: string): boolean {
    return this.busy.has(key);
  }

  get activeKeys(): number {
    return this.busy.size;
  }
}
