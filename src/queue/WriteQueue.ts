import { WriteTimeoutError, errorMessage } from '../utils/errors';

import type { Logger } from '../utils/logger';

export interface WriteJob {
  id: string;
  run: (signal: AbortSignal) => Promise<unknown>;
}

export interface WriteQueueOptions {
  concurrency: number;
  jobTimeoutMs: number;
  log: Logger;
  maxQueueSize: number;
}

export interface ShutdownResult {
  /** False when running jobs had to be aborted. */
  completed: boolean;
  /** Queued jobs dropped without running. */
  discarded: number;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new WriteTimeoutError('write aborted');
}

/**
 * Settle with the job's outcome or the signal's reason, whichever comes
 * first, so a job that ignores its signal still frees the worker.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(abortReason(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Bounded background work queue with a fixed number of workers.
 *
 * `enqueue` never waits: it returns false when the backlog is full, which
 * the HTTP layer turns into a 503. Each job gets an AbortSignal that fires
 * on its deadline or on shutdown.
 */
export class WriteQueue {
  private accepting = true;
  private idleWaiters: (() => void)[] = [];
  private readonly options: WriteQueueOptions;
  private readonly pending: WriteJob[] = [];
  private readonly running = new Map<WriteJob, AbortController>();

  constructor(options: WriteQueueOptions) {
    this.options = options;
  }

  get active(): number {
    return this.running.size;
  }

  get queued(): number {
    return this.pending.length;
  }

  enqueue(job: WriteJob): boolean {
    if (!this.accepting) return false;

    if (this.running.size < this.options.concurrency) {
      this.start(job);
      return true;
    }
    if (this.pending.length >= this.options.maxQueueSize) {
      this.options.log.warn('Write queue full, rejecting job', {
        jobId: job.id,
        queued: this.pending.length,
      });
      return false;
    }
    this.pending.push(job);
    return true;
  }

  /**
   * Resolves once nothing is queued or running.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting jobs and let queued and running work finish within
   * `timeoutMs`. Whatever is left after that is aborted or discarded.
   */
  async shutdown(timeoutMs: number): Promise<ShutdownResult> {
    this.accepting = false;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => {
        resolve(true);
      }, timeoutMs);
    });
    const expired = await Promise.race([this.onIdle().then(() => false), timedOut]);
    clearTimeout(timer);

    if (!expired) return { completed: true, discarded: 0 };

    const discarded = this.pending.splice(0).length;
    const aborted = this.running.size;
    for (const controller of this.running.values()) {
      controller.abort(new WriteTimeoutError('write cancelled by shutdown'));
    }
    this.options.log.warn('Shutdown deadline reached', { aborted, discarded });

    await this.onIdle();
    return { completed: aborted === 0, discarded };
  }

  private drain(): void {
    while (this.running.size < this.options.concurrency && this.pending.length > 0) {
      const next = this.pending.shift();
      if (next) this.start(next);
    }
    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async execute(job: WriteJob, controller: AbortController): Promise<void> {
    const { jobTimeoutMs } = this.options;
    const timer = setTimeout(() => {
      controller.abort(
        new WriteTimeoutError(`write ${job.id} exceeded ${String(jobTimeoutMs)}ms`),
      );
    }, jobTimeoutMs);

    try {
      await raceAbort(job.run(controller.signal), controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private isIdle(): boolean {
    return this.running.size === 0 && this.pending.length === 0;
  }

  private start(job: WriteJob): void {
    const controller = new AbortController();
    this.running.set(job, controller);

    void this.execute(job, controller)
      .catch((error: unknown) => {
        this.options.log.error('Write job failed', error, {
          error: errorMessage(error),
          jobId: job.id,
        });
      })
      .finally(() => {
        this.running.delete(job);
        this.drain();
      });
  }
}
