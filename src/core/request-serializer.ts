import pLimit from 'p-limit';

/**
 * Admits one task at a time, in arrival order. One instance per supervisor;
 * it gives no guarantee across OS processes.
 */
export class RequestSerializer {
  private readonly limit = pLimit(1);

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(task);
  }

  /** Tasks waiting behind the running one. */
  get pending(): number {
    return this.limit.pendingCount;
  }

  get busy(): boolean {
    return this.limit.activeCount > 0;
  }
}
