import { QueueClass } from '@contentreview/core';

export interface WorkerPoolStats {
  queueClass: QueueClass;
  concurrency: number;
  active: number;
  queued: number;
}

/**
 * Bounded executor for one queue class. Tasks beyond `concurrency` wait in
 * FIFO order; a slot is held only while a task runs.
 */
export class WorkerPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(
    readonly queueClass: QueueClass,
    readonly concurrency: number
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Worker pool ${queueClass} needs a positive concurrency, got ${concurrency}`);
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  stats(): WorkerPoolStats {
    return {
      queueClass: this.queueClass,
      concurrency: this.concurrency,
      active: this.active,
      queued: this.waiting.length,
    };
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiting.shift();
    if (next) {
      next();
    }
  }
}

export type WorkerPools = Readonly<Record<QueueClass, WorkerPool>>;

export interface WorkerPoolSizes {
  aiBound: number;
  ioBound: number;
  lightweight: number;
}

export const DEFAULT_POOL_SIZES: WorkerPoolSizes = {
  aiBound: 5,
  ioBound: 20,
  lightweight: 50,
};

export function createWorkerPools(sizes: WorkerPoolSizes = DEFAULT_POOL_SIZES): WorkerPools {
  return {
    [QueueClass.AI_BOUND]: new WorkerPool(QueueClass.AI_BOUND, sizes.aiBound),
    [QueueClass.IO_BOUND]: new WorkerPool(QueueClass.IO_BOUND, sizes.ioBound),
    [QueueClass.LIGHTWEIGHT]: new WorkerPool(QueueClass.LIGHTWEIGHT, sizes.lightweight),
  };
}
