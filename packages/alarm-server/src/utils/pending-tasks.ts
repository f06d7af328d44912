/**
 * Tracks fire-and-forget promises so they can be awaited later (on
 * shutdown, or by tests) and so a rejection is always reported.
 */
export class PendingTasks {
  private readonly tasks = new Set<Promise<void>>();
  private readonly onError: (err: unknown) => void;

  constructor(onError: (err: unknown) => void) {
    this.onError = onError;
  }

  track(task: Promise<unknown>): void {
    const settled: Promise<void> = task
      .then(() => undefined, (err: unknown) => this.onError(err))
      .finally(() => {
        this.tasks.delete(settled);
      });
    this.tasks.add(settled);
  }

  /** Resolves once every tracked task, including ones added meanwhile, has settled. */
  async flush(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  get size(): number {
    return this.tasks.size;
  }
}
