import type { Worker } from 'node:worker_threads';

type Job<TTask, TReply> = {
  task: TTask;
  resolve: (reply: TReply) => void;
  reject: (error: Error) => void;
};

export type WorkerPoolOptions<TReply> = {
  size: number;
  spawn: () => Worker;
  parseReply: (value: unknown) => TReply;
};

function toError(value: unknown) {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Fixed-size pool of worker threads, one task in flight per worker.
 * Workers start lazily and are unref'd while idle so they never hold the
 * process open.
 */
export class WorkerPool<TTask, TReply> {
  private readonly workers = new Set<Worker>();
  private readonly idle: Worker[] = [];
  private readonly busy = new Map<Worker, Job<TTask, TReply>>();
  private readonly queue: Job<TTask, TReply>[] = [];
  private closed = false;

  constructor(private readonly options: WorkerPoolOptions<TReply>) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${options.size}`);
    }
  }

  run(task: TTask): Promise<TReply> {
    if (this.closed) {
      return Promise.reject(new Error('Worker pool is closed'));
    }
    return new Promise<TReply>((resolve, reject) => {
      this.queue.push({ task, resolve, reject });
      this.pump();
    });
  }

  async close() {
    this.closed = true;
    for (const job of this.queue.splice(0)) {
      job.reject(new Error('Worker pool is closed'));
    }
    const workers = [...this.workers];
    this.workers.clear();
    this.idle.length = 0;
    for (const [, job] of this.busy) {
      job.reject(new Error('Worker pool is closed'));
    }
    this.busy.clear();
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  private pump() {
    while (this.queue.length > 0) {
      const worker = this.idle.pop() ?? this.grow();
      if (!worker) {
        return;
      }
      const job = this.queue.shift();
      if (!job) {
        this.release(worker);
        return;
      }
      this.busy.set(worker, job);
      worker.ref();
      worker.postMessage(job.task);
    }
  }

  private grow() {
    if (this.workers.size >= this.options.size) {
      return undefined;
    }
    const worker = this.options.spawn();
    this.workers.add(worker);
    worker.on('message', (value: unknown) => this.settle(worker, value));
    worker.on('error', (error: Error) => this.fail(worker, error));
    worker.on('exit', (code: number) => this.fail(worker, new Error(`Worker exited with code ${code}`)));
    return worker;
  }

  private release(worker: Worker) {
    worker.unref();
    this.idle.push(worker);
  }

  private settle(worker: Worker, value: unknown) {
    const job = this.busy.get(worker);
    this.busy.delete(worker);
    this.release(worker);

    if (job) {
      try {
        job.resolve(this.options.parseReply(value));
      } catch (error) {
        job.reject(toError(error));
      }
    }
    this.pump();
  }

  /** Drops a crashed or exited worker and fails its task; later tasks get a fresh worker. */
  private fail(worker: Worker, error: Error) {
    if (!this.workers.delete(worker)) {
      return;
    }
    const idleAt = this.idle.indexOf(worker);
    if (idleAt >= 0) {
      this.idle.splice(idleAt, 1);
    }
    const job = this.busy.get(worker);
    this.busy.delete(worker);
    job?.reject(error);
    this.pump();
  }
}
