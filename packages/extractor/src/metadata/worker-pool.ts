/**
 * Bounded worker pool for blocking metadata extraction
 *
 * At most `maxWorkers` tasks run at once; the rest wait in FIFO order.
 * Built once at process start and handed to every MetadataExtractor so the
 * limit is global rather than per extractor.
 */
export class WorkerPool {
  readonly maxWorkers: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(maxWorkers: number = 2) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
    this.maxWorkers = maxWorkers;
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxWorkers) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Lease passes straight to the next task
      next();
      return;
    }
    this.active--;
  }
}
