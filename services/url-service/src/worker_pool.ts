export interface PoolJob<T> {
  /** Resolves once every task of the job has been picked up by a worker. */
  readonly dispatched: Promise<void>;
  /** Resolves with one outcome per task, in submission order. Never rejects. */
  readonly settled: Promise<PromiseSettledResult<T>[]>;
}

/**
 * Runs submitted tasks with at most `concurrency` in flight across all jobs.
 * Tasks run to completion whether or not anyone still awaits the job.
 */
export class WorkerPool {
  private readonly queue: Array<() => void> = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency <= 0) {
      throw new Error(`Invalid worker pool concurrency: ${concurrency}`);
    }
  }

  get pending(): number {
    return this.queue.length + this.active;
  }

  submit<T>(tasks: ReadonlyArray<() => Promise<T>>): PoolJob<T> {
    const started: Promise<void>[] = [];
    const runs: Promise<T>[] = [];

    for (const task of tasks) {
      let markStarted: () => void = () => {};
      started.push(
        new Promise<void>((resolve) => {
          markStarted = () => resolve();
        })
      );
      runs.push(
        new Promise<T>((resolve, reject) => {
          this.queue.push(() => {
            markStarted();
            this.run(task).then(resolve, reject);
          });
        })
      );
    }

    this.pump();

    return {
      dispatched: Promise.all(started).then(() => undefined),
      settled: Promise.allSettled(runs)
    };
  }

  /** Resolves when nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private async run<T>(task: () => Promise<T>): Promise<T> {
    this.active++;
    try {
      return await task();
    } finally {
      this.active--;
      this.pump();
    }
  }

  private pump(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const start = this.queue.shift();
      start?.();
    }

    if (this.pending === 0 && this.idleWaiters.length > 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
