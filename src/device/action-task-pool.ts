interface QueuedTask {
  run: () => Promise<void>;
}

/**
 * Runs background tasks with at most `maxConcurrent` in flight; the rest wait in FIFO order.
 */
export class ActionTaskPool {
  private readonly queue: QueuedTask[] = [];
  private active = 0;

  constructor(readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Schedules `task` and resolves or rejects with its result once it has run.
   */
  submit<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: () => Promise.resolve().then(task).then(resolve, reject),
      });
      this.drain();
    });
  }

  private drain(): void {
    while (this.active < this.maxConcurrent && this.queue.length > 0) {
      const [next] = this.queue.splice(0, 1);
      this.active += 1;
      void next.run().finally(() => {
        this.active -= 1;
        this.drain();
      });
    }
  }
}
