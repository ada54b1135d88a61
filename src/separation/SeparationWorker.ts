import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import { JobQueue } from '../jobs/JobQueue.js';
import { JobStore, JobUpdate } from '../jobs/JobStore.js';
import { ModelLease, ModelRegistry } from '../models/ModelRegistry.js';
import { getJobLogger, logger, errorMessage } from '../utils/logger.js';
import { describeJobFailure } from '../errors/SidecarError.js';
import { JobStage, JobStatus } from '../types/index.js';
import { SeparationEngine, STEM_EXTENSION } from './SeparationEngine.js';
import { collectStems, jobOutputDir } from './StemCollector.js';

export interface SeparationWorkerOptions {
  modelVariant: string;
  mp3Bitrate: number;
  outputDirPrefix: string;
}

/**
 * Worker that processes separation jobs from the queue
 */
export class SeparationWorker {
  private jobQueue: JobQueue;
  private jobStore: JobStore;
  private modelRegistry: ModelRegistry;
  private engine: SeparationEngine;
  private options: SeparationWorkerOptions;
  private isRunning: boolean = false;

  constructor(
    jobQueue: JobQueue,
    jobStore: JobStore,
    modelRegistry: ModelRegistry,
    engine: SeparationEngine,
    options: SeparationWorkerOptions
  ) {
    this.jobQueue = jobQueue;
    this.jobStore = jobStore;
    this.modelRegistry = modelRegistry;
    this.engine = engine;
    this.options = options;
  }

  start(): void {
    if (this.isRunning) {
      logger.info('Separation worker is already running');
      return;
    }

    this.isRunning = true;
    this.jobQueue.registerJobHandler(jobId => this.process(jobId));
    this.jobQueue.start();
    logger.info('Starting separation worker', {
      modelVariant: this.options.modelVariant,
      queued: this.jobQueue.getQueueLength()
    });
  }

  /**
   * Stop picking up jobs. A separation already running is not interrupted.
   */
  stop(): void {
    this.isRunning = false;
    this.jobQueue.stop();
    logger.info('Stopping separation worker');
  }

  /**
   * Run one job to a terminal state. Never throws: every failure ends up on the
   * job record.
   */
  async process(jobId: string): Promise<void> {
    const jobLogger = getJobLogger(jobId);
    const job = this.jobStore.get(jobId);

    if (!job) {
      logger.error(`Job ${jobId} not found in store`);
      return;
    }
    if (job.status !== JobStatus.PENDING) {
      jobLogger.info(`Skipping job in status ${job.status}`);
      return;
    }

    this.jobStore.updateStatus(jobId, JobStatus.PROCESSING);
    jobLogger.info(`Processing separation job for ${job.filePath}`);

    let lease: ModelLease | null = null;
    try {
      await this.assertReadable(job.filePath);

      this.jobStore.updateProgress(jobId, 0, JobStage.LOADING_MODEL);
      lease = await this.modelRegistry.acquire(job.model);

      const outputDir = jobOutputDir(job.filePath, jobId, this.options.outputDirPrefix);
      await fs.mkdir(outputDir, { recursive: true });

      this.jobStore.updateProgress(jobId, 0, JobStage.SEPARATING);
      await this.engine.separate(
        {
          filePath: job.filePath,
          outputDir,
          modelVariant: this.options.modelVariant,
          device: lease.handle.device,
          mp3Bitrate: this.options.mp3Bitrate
        },
        percent => {
          this.jobStore.updateProgress(jobId, percent);
        }
      );

      this.jobStore.updateProgress(jobId, 0, JobStage.COLLECTING);
      const result = await collectStems(outputDir, this.options.modelVariant, job.filePath, STEM_EXTENSION);

      if (this.finish(jobId, JobStatus.COMPLETED, { result })) {
        jobLogger.info(`Job finished with ${Object.keys(result).length} stems`, { outputDir });
      }
    } catch (error) {
      jobLogger.error(`Job failed: ${errorMessage(error)}`, {
        stack: error instanceof Error ? error.stack : undefined
      });
      this.finish(jobId, JobStatus.FAILED, { error: describeJobFailure(error) });
    } finally {
      if (lease) {
        lease.release();
      }
    }
  }

  /**
   * Write the terminal state unless the job was cancelled while it ran
   */
  private finish(jobId: string, status: JobStatus, updates: JobUpdate): boolean {
    if (this.jobStore.isCancelled(jobId)) {
      getJobLogger(jobId).info(`Job was cancelled while processing, discarding ${status} outcome`);
      return false;
    }
    return this.jobStore.updateStatus(jobId, status, updates);
  }

  private async assertReadable(filePath: string): Promise<void> {
    try {
      await fs.access(filePath, fsConstants.R_OK);
    } catch {
      throw new Error(`Input file not found or not readable: ${filePath}`);
    }
  }
}
