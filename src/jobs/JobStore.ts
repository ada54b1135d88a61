import { randomUUID } from 'crypto';
import cloneDeep from 'lodash/cloneDeep.js';
import { logger } from '../utils/logger.js';
import { NotFoundError } from '../errors/SidecarError.js';
import {
  CancelOutcome,
  JobStage,
  JobStatus,
  ModelName,
  SeparationJob,
  StemMap,
  isTerminalStatus
} from '../types/index.js';

const STATUS_RANK: Record<JobStatus, number> = {
  [JobStatus.PENDING]: 0,
  [JobStatus.PROCESSING]: 1,
  [JobStatus.COMPLETED]: 2,
  [JobStatus.FAILED]: 2,
  [JobStatus.CANCELLED]: 2
};

export const DEFAULT_STEM_COUNT = 4;

export interface CreateJobOptions {
  stemCount?: number;
  model?: ModelName;
}

export interface JobUpdate {
  result?: StemMap;
  error?: string;
}

/**
 * In-memory record of every separation job. Records are replaced whole on each
 * write and handed out as copies, so readers never see a partial update.
 */
export class JobStore {
  private jobs: Map<string, SeparationJob> = new Map();
  private generateId: () => string;

  constructor(generateId: () => string = randomUUID) {
    this.generateId = generateId;
  }

  create(filePath: string, options: CreateJobOptions = {}): string {
    let jobId = this.generateId();
    while (this.jobs.has(jobId)) {
      jobId = this.generateId();
    }

    this.jobs.set(jobId, {
      jobId,
      status: JobStatus.PENDING,
      filePath,
      stemCount: options.stemCount ?? DEFAULT_STEM_COUNT,
      model: options.model ?? 'demucs',
      progress: 0,
      currentStage: JobStage.QUEUED,
      result: null,
      error: null,
      createdAt: new Date().toISOString(),
      startedAt: null,
      completedAt: null
    });

    logger.debug(`Created job ${jobId} for ${filePath}`);
    return jobId;
  }

  get(jobId: string): SeparationJob | null {
    const job = this.jobs.get(jobId);
    return job ? cloneDeep(job) : null;
  }

  isCancelled(jobId: string): boolean {
    return this.jobs.get(jobId)?.status === JobStatus.CANCELLED;
  }

  /**
   * Move a job forward. Returns false when the job is already terminal or the
   * transition would go backwards; the record is left untouched in that case.
   */
  updateStatus(jobId: string, status: JobStatus, updates: JobUpdate = {}): boolean {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new NotFoundError(`Job not found: ${jobId}`);
    }

    if (isTerminalStatus(current.status)) {
      logger.warn(`Ignoring ${status} for job ${jobId}: already ${current.status}`);
      return false;
    }
    if (STATUS_RANK[status] < STATUS_RANK[current.status]) {
      logger.warn(`Ignoring backwards transition ${current.status} -> ${status} for job ${jobId}`);
      return false;
    }

    const now = new Date().toISOString();
    const next: SeparationJob = {
      ...current,
      status,
      result: updates.result !== undefined ? cloneDeep(updates.result) : current.result,
      error: updates.error !== undefined ? updates.error : current.error,
      startedAt: status === JobStatus.PROCESSING && !current.startedAt ? now : current.startedAt,
      completedAt: isTerminalStatus(status) ? now : current.completedAt
    };

    if (status === JobStatus.COMPLETED) {
      next.result = next.result ?? {};
      next.progress = 100;
      next.currentStage = JobStage.DONE;
    }

    this.jobs.set(jobId, next);
    logger.debug(`Job ${jobId} ${current.status} -> ${status}`);
    return true;
  }

  /**
   * Progress never decreases and is ignored once the job is terminal
   */
  updateProgress(jobId: string, progress: number, stage?: JobStage): boolean {
    const current = this.jobs.get(jobId);
    if (!current || isTerminalStatus(current.status)) {
      return false;
    }

    const clamped = Math.min(100, Math.max(0, progress));
    this.jobs.set(jobId, {
      ...current,
      progress: Math.max(current.progress, clamped),
      currentStage: stage ?? current.currentStage
    });
    return true;
  }

  /**
   * Best-effort flag for polling clients, applied whatever the current status;
   * running work is not interrupted. Once set, nothing overwrites it.
   */
  markCancelled(jobId: string): CancelOutcome {
    const current = this.jobs.get(jobId);
    if (!current) {
      return 'not_found';
    }
    if (current.status === JobStatus.CANCELLED) {
      return 'cancelled';
    }

    this.jobs.set(jobId, {
      ...current,
      status: JobStatus.CANCELLED,
      completedAt: current.completedAt ?? new Date().toISOString()
    });
    logger.info(`Job ${jobId} marked cancelled (was ${current.status})`);
    return 'cancelled';
  }

  /**
   * Drop terminal jobs that finished more than `olderThanMs` ago
   * @returns Number of removed jobs
   */
  pruneFinished(olderThanMs: number, now: number = Date.now()): number {
    const cutoff = now - olderThanMs;
    let removed = 0;

    for (const [jobId, job] of this.jobs) {
      if (!isTerminalStatus(job.status) || !job.completedAt) continue;
      if (Date.parse(job.completedAt) < cutoff) {
        this.jobs.delete(jobId);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug(`Pruned ${removed} finished jobs older than ${olderThanMs} ms`);
    }
    return removed;
  }
}
