// src/pipeline/taskPool.ts

type Job = {
  label: string;
  task: () => Promise<void>;
  onError: (err: unknown) => Promise<void> | void;
};

function errMsg(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Bounded pool for work that runs detached from the request that started it.
 * `submit` never throws and never rejects: a failing task is handed to its
 * `onError`, and a failing `onError` is logged.
 */
export class TaskPool {
  private readonly queue: Job[] = [];
  private active = 0;
  private idleWaiters: (() => void)[] = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`TaskPool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  submit(label: string, task: () => Promise<void>, onError: Job["onError"]): void {
    this.queue.push({ label, task, onError });
    this.pump();
  }

  stats(): { active: number; queued: number } {
    return { active: this.active, queued: this.queue.length };
  }

  /** Resolves once nothing is running or queued. */
  idle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.active < this.concurrency && this.queue.length) {
      const job = this.queue.shift();
      if (!job) break;
      this.active++;
      void this.run(job);
    }
  }

  private async run(job: Job): Promise<void> {
    const start = Date.now();
    try {
      await job.task();
    } catch (e: unknown) {
      console.error(`[POOL][${job.label}] task failed`, errMsg(e));
      try {
        await job.onError(e);
      } catch (e2: unknown) {
        console.error(`[POOL][${job.label}] error handler failed`, errMsg(e2));
      }
    } finally {
      this.active--;
      console.log(`[POOL][${job.label}] done`, { ms: Date.now() - start, ...this.stats() });
      this.pump();
      if (this.active === 0 && this.queue.length === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const w of waiters) w();
      }
    }
  }
}
