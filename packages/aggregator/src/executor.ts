import { availableParallelism } from 'os';
import { ExecutorShutdownError } from '@cardinal/core';

export interface BoundedExecutorConfig {
  maxConcurrency?: number; // Default: 4 x available parallelism
}

interface QueuedTask {
  run: () => Promise<void>;
  reject: (error: Error) => void;
}

export function defaultConcurrency(): number {
  return 4 * availableParallelism();
}

/**
 * Admission gate capping the number of simultaneously running tasks.
 * Excess submissions queue; start order is not guaranteed to be fair.
 */
export class BoundedExecutor {
  private readonly maxConcurrency: number;
  private readonly queue: QueuedTask[] = [];
  private running = 0;
  private stopped = false;

  constructor(config: BoundedExecutorConfig = {}) {
    this.maxConcurrency = config.maxConcurrency ?? defaultConcurrency();
    if (!Number.isInteger(this.maxConcurrency) || this.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${this.maxConcurrency}`);
    }
  }

  submit<T>(task: () => T | Promise<T>): Promise<T> {
    if (this.stopped) {
      return Promise.reject(new ExecutorShutdownError());
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: () => Promise.resolve().then(task).then(resolve, reject),
        reject,
      });
      this.drain();
    });
  }

  /**
   * Stop accepting work and abandon every queued task.
   * Tasks already running are left to finish.
   */
  shutdown(): void {
    this.stopped = true;
    for (const task of this.queue.splice(0)) {
      task.reject(new ExecutorShutdownError('Executor shut down before the task started'));
    }
  }

  get isShutdown(): boolean {
    return this.stopped;
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  get concurrency(): number {
    return this.maxConcurrency;
  }

  private drain(): void {
    while (!this.stopped && this.running < this.maxConcurrency) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      this.running++;
      void next.run().then(() => {
        this.running--;
        this.drain();
      });
    }
  }
}
