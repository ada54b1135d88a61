import { logger, errorMessage } from '../utils/logger.js';

export type JobHandler = (jobId: string) => Promise<void>;

/**
 * FIFO of job IDs drained by a supervising loop with bounded concurrency.
 * Draining is deferred to the next turn of the event loop so that a submitter
 * always observes its job as pending first.
 */
export class JobQueue {
  private queue: string[] = [];
  private active: Set<Promise<void>> = new Set();
  private handler: JobHandler | null = null;
  private running: boolean = false;
  private drainScheduled: boolean = false;
  private concurrency: number;

  constructor(concurrency: number = 1) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`JobQueue concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  /**
   * Add a job ID to the queue
   */
  addJob(jobId: string): void {
    this.queue.push(jobId);
    logger.debug(`Added job ${jobId} to queue. Queue length: ${this.queue.length}`);
    this.scheduleDrain();
  }

  registerJobHandler(handler: JobHandler): void {
    this.handler = handler;
  }

  /**
   * Retrieve the next job from the queue
   * @returns The next job ID or null if the queue is empty
   */
  retrieveJob(): string | null {
    return this.queue.shift() ?? null;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleDrain();
  }

  /**
   * Stop picking up new jobs. Jobs already running are left to finish.
   */
  stop(): void {
    this.running = false;
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  getActiveCount(): number {
    return this.active.size;
  }

  /**
   * Clear all queued (not yet running) jobs
   * @returns Number of dropped job IDs
   */
  clearQueue(): number {
    const count = this.queue.length;
    this.queue = [];
    logger.debug(`Cleared ${count} jobs from queue`);
    return count;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    const handler = this.handler;
    if (!this.running || !handler) return;

    while (this.active.size < this.concurrency) {
      const jobId = this.retrieveJob();
      if (!jobId) break;

      const task: Promise<void> = handler(jobId)
        .catch(error => {
          logger.error(`Unhandled error while processing job ${jobId}: ${errorMessage(error)}`);
        })
        .finally(() => {
          this.active.delete(task);
          this.drain();
        });
      this.active.add(task);
    }
  }
}
