import { ulid } from 'ulid';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { JOB_QUEUE_CONFIG } from '@/config/businessRules';

const logger = createLogger('JobQueue');

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface Job<T = unknown> {
  id: string;
  name: string;
  data: T;
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  error?: string;
}

export interface JobOptions {
  maxAttempts?: number;
  delay?: number; // milliseconds
}

export type JobHandler<T> = (job: Job<T>) => Promise<void>;

export type EvictionListener = (job: Job) => void;

export interface JobQueueOptions {
  concurrency?: number;
  backoffBaseMs?: number;
  maxFinishedJobs?: number;
}

/**
 * Background job queue
 * `Jobs` maps each job name to its payload type.
 */
export interface IJobQueue<Jobs extends Record<string, unknown>> {
  register<K extends keyof Jobs & string>(name: K, handler: JobHandler<Jobs[K]>): this;
  enqueue<K extends keyof Jobs & string>(name: K, data: Jobs[K], options?: JobOptions): Job<Jobs[K]>;
  getJob(id: string): Job | null;
  stats(): Record<JobStatus, number>;
  /** Called with each finished job dropped from memory; returns an unsubscribe */
  onEvicted(listener: EvictionListener): () => void;
}

interface QueuedJob {
  job: Job;
  execute: () => Promise<void>;
}

type HandlerMap<Jobs> = { [K in keyof Jobs]?: JobHandler<Jobs[K]> };

/**
 * In-process job queue
 *
 * - Jobs run in FIFO order with a concurrency limit
 * - A failed attempt is retried after 2^attempts * backoffBaseMs until maxAttempts
 * - Finished jobs stay queryable until maxFinishedJobs newer ones finish,
 *   then onEvicted listeners are told
 *
 * Jobs are lost on restart; only work that can be re-requested (exports,
 * image processing) is queued here.
 */
export class JobQueue<Jobs extends Record<string, unknown>> implements IJobQueue<Jobs> {
  private handlers: HandlerMap<Jobs> = {};
  private jobs = new Map<string, QueuedJob>();
  private pending: string[] = [];
  private running = new Map<string, Promise<void>>();
  private timers = new Set<NodeJS.Timeout>();
  private finished: string[] = [];
  private idleWaiters: Array<() => void> = [];
  private evictionListeners = new Set<EvictionListener>();
  private accepting = true;

  private readonly concurrency: number;
  private readonly backoffBaseMs: number;
  private readonly maxFinishedJobs: number;

  constructor(options: JobQueueOptions = {}) {
    this.concurrency = options.concurrency ?? JOB_QUEUE_CONFIG.CONCURRENCY;
    this.backoffBaseMs = options.backoffBaseMs ?? JOB_QUEUE_CONFIG.BACKOFF_BASE_MS;
    this.maxFinishedJobs = options.maxFinishedJobs ?? JOB_QUEUE_CONFIG.MAX_FINISHED_JOBS;
  }

  /**
   * Register a job handler
   */
  register<K extends keyof Jobs & string>(name: K, handler: JobHandler<Jobs[K]>): this {
    this.handlers[name] = handler;
    return this;
  }

  /**
   * Enqueue a job
   */
  enqueue<K extends keyof Jobs & string>(
    name: K,
    data: Jobs[K],
    options: JobOptions = {}
  ): Job<Jobs[K]> {
    if (!this.accepting) {
      throw new Error('Job queue is shutting down');
    }
    if (!this.handlers[name]) {
      throw new Error(`No handler registered for job: ${name}`);
    }

    const job: Job<Jobs[K]> = {
      id: ulid(),
      name,
      data,
      status: 'pending',
      attempts: 0,
      maxAttempts: options.maxAttempts ?? JOB_QUEUE_CONFIG.DEFAULT_MAX_ATTEMPTS,
      createdAt: new Date(),
    };

    const execute = async (): Promise<void> => {
      const handler = this.handlers[name];
      if (!handler) {
        throw new Error(`No handler registered for job: ${name}`);
      }
      await handler(job);
    };

    this.jobs.set(job.id, { job, execute });
    logger.debug({ jobId: job.id, name }, 'Job enqueued');

    if (options.delay) {
      this.schedule(job.id, options.delay);
    } else {
      this.pending.push(job.id);
      this.drain();
    }

    return job;
  }

  /**
   * Get a job by ID
   */
  getJob(id: string): Job | null {
    return this.jobs.get(id)?.job ?? null;
  }

  stats(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0 };
    for (const { job } of this.jobs.values()) {
      counts[job.status] += 1;
    }
    return counts;
  }

  onEvicted(listener: EvictionListener): () => void {
    this.evictionListeners.add(listener);
    return () => {
      this.evictionListeners.delete(listener);
    };
  }

  /**
   * Resolves once nothing is pending, running or waiting for a retry
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting jobs, drop scheduled retries and wait for running jobs
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.pending = [];
    await Promise.allSettled([...this.running.values()]);
    this.notifyIdle();
  }

  private schedule(jobId: string, delayMs: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.pending.push(jobId);
      this.drain();
    }, delayMs);
    timer.unref();
    this.timers.add(timer);
  }

  private drain(): void {
    while (this.running.size < this.concurrency && this.pending.length > 0) {
      const jobId = this.pending.shift();
      const entry = jobId ? this.jobs.get(jobId) : undefined;
      if (!jobId || !entry) continue;

      const run = this.runAttempt(entry).finally(() => {
        this.running.delete(jobId);
        this.drain();
        this.notifyIdle();
      });
      this.running.set(jobId, run);
    }
  }

  private async runAttempt({ job, execute }: QueuedJob): Promise<void> {
    job.status = 'running';
    job.attempts += 1;
    job.startedAt = new Date();

    try {
      await execute();
      job.status = 'completed';
      job.finishedAt = new Date();
      job.error = undefined;
      logger.info({ jobId: job.id, name: job.name, attempts: job.attempts }, 'Job completed');
      this.markFinished(job.id);
    } catch (error) {
      job.error = error instanceof Error ? error.message : String(error);

      if (job.attempts < job.maxAttempts && this.accepting) {
        const delay = Math.pow(2, job.attempts) * this.backoffBaseMs;
        job.status = 'pending';
        logger.warn(
          { jobId: job.id, name: job.name, attempts: job.attempts, delay, error: job.error },
          'Job failed, retry scheduled'
        );
        this.schedule(job.id, delay);
      } else {
        job.status = 'failed';
        job.finishedAt = new Date();
        logger.error(
          { jobId: job.id, name: job.name, attempts: job.attempts, error: job.error },
          'Job permanently failed'
        );
        this.markFinished(job.id);
      }
    }
  }

  private markFinished(jobId: string): void {
    this.finished.push(jobId);
    while (this.finished.length > this.maxFinishedJobs) {
      const oldest = this.finished.shift();
      const entry = oldest ? this.jobs.get(oldest) : undefined;
      if (!oldest || !entry) continue;

      this.jobs.delete(oldest);
      for (const listener of this.evictionListeners) {
        try {
          listener(entry.job);
        } catch (error) {
          logger.error({ error, jobId: oldest }, 'Eviction listener failed');
        }
      }
    }
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.running.size === 0 && this.timers.size === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
