import { JobStore, DEFAULT_STEM_COUNT } from '../jobs/JobStore.js';
import { JobQueue } from '../jobs/JobQueue.js';
import { ModelRegistry } from '../models/ModelRegistry.js';
import { DeviceProbe } from '../device/DeviceProbe.js';
import { NotFoundError } from '../errors/SidecarError.js';
import { logger } from '../utils/logger.js';
import {
  HealthReport,
  JobStatus,
  LoadOutcome,
  SeparationJob,
  UnloadOutcome
} from '../types/index.js';

export interface SubmitSeparationInput {
  filePath: string;
  stemCount?: number;
}

export interface SubmitSeparationResult {
  jobId: string;
  status: JobStatus.PENDING;
}

export interface ServiceFacadeDependencies {
  jobStore: JobStore;
  jobQueue: JobQueue;
  modelRegistry: ModelRegistry;
  deviceProbe: DeviceProbe;
}

/**
 * Request-level operations of the sidecar. Synchronous failures are thrown as
 * SidecarError subclasses; separation outcomes are only visible through getJob.
 */
export class ServiceFacade {
  private jobStore: JobStore;
  private jobQueue: JobQueue;
  private modelRegistry: ModelRegistry;
  private deviceProbe: DeviceProbe;

  constructor(deps: ServiceFacadeDependencies) {
    this.jobStore = deps.jobStore;
    this.jobQueue = deps.jobQueue;
    this.modelRegistry = deps.modelRegistry;
    this.deviceProbe = deps.deviceProbe;
  }

  async health(): Promise<HealthReport> {
    const device = await this.deviceProbe.probe();
    return {
      status: 'ok',
      gpuAvailable: device.gpuAvailable,
      device: device.gpuName ?? null,
      models: this.modelRegistry.snapshot(),
      queue: {
        pending: this.jobQueue.getQueueLength(),
        running: this.jobQueue.getActiveCount()
      }
    };
  }

  async loadModel(modelName: string): Promise<{ status: LoadOutcome }> {
    const status = await this.modelRegistry.load(modelName);
    return { status };
  }

  async unloadModel(modelName: string): Promise<{ status: UnloadOutcome }> {
    const status = await this.modelRegistry.unload(modelName);
    return { status };
  }

  /**
   * Record the job and hand it to the background queue; returns before any work starts
   */
  submitSeparation(input: SubmitSeparationInput): SubmitSeparationResult {
    const jobId = this.jobStore.create(input.filePath, {
      stemCount: input.stemCount ?? DEFAULT_STEM_COUNT
    });
    this.jobQueue.addJob(jobId);
    logger.info(`Queued separation job ${jobId}`, { filePath: input.filePath });
    return { jobId, status: JobStatus.PENDING };
  }

  getJob(jobId: string): SeparationJob {
    const job = this.jobStore.get(jobId);
    if (!job) {
      throw new NotFoundError('Job not found');
    }
    return job;
  }

  cancelJob(jobId: string): { status: 'cancelled' } {
    if (this.jobStore.markCancelled(jobId) === 'not_found') {
      throw new NotFoundError('Job not found');
    }
    return { status: 'cancelled' };
  }
}
