/**
 * SerialExecutor: runs submitted jobs one at a time, in submission order.
 *
 * The session owns a single connection and at most one cursor, so every
 * dispatch against it goes through here; async driver calls never interleave.
 */

import { AsyncQueue } from './async-queue.js';
import * as log from '../utils/logger.js';

interface Job {
  run(): Promise<void>;
  cancel(err: Error): void;
}

export class ExecutorStoppedError extends Error {
  constructor() {
    super('Executor is stopped');
    this.name = 'ExecutorStoppedError';
  }
}

export class SerialExecutor {
  private readonly queue: AsyncQueue<Job>;
  private readonly stopper = new AbortController();
  private readonly loop: Promise<void>;

  constructor(maxPending = 1_000) {
    this.queue = new AsyncQueue<Job>(maxPending);
    this.loop = this.drain(this.stopper.signal);
  }

  get stopped(): boolean {
    return this.stopper.signal.aborted;
  }

  submit<T>(task: () => Promise<T>): Promise<T> {
    if (this.stopped) return Promise.reject(new ExecutorStoppedError());

    return new Promise<T>((resolve, reject) => {
      const job: Job = {
        run: () => Promise.resolve().then(task).then(resolve, reject),
        cancel: reject,
      };
      this.queue.publish(job, this.stopper.signal).catch(reject);
    });
  }

  /** Stop after the job in progress; queued jobs are rejected. */
  async stop(): Promise<void> {
    if (!this.stopped) {
      this.stopper.abort();
      for (const job of this.queue.clear()) job.cancel(new ExecutorStoppedError());
    }
    await this.loop;
  }

  private async drain(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let job: Job;
      try {
        job = await this.queue.consume(signal);
      } catch (err) {
        if (signal.aborted) break;
        log.error(`Executor queue failed: ${log.describeError(err)}`);
        continue;
      }
      await job.run();
    }
  }
}
