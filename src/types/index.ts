export enum JobStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled'
}

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set([
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.CANCELLED
]);

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Coarse stage label reported alongside numeric progress
 */
export enum JobStage {
  NONE = '',
  QUEUED = 'queued',
  LOADING_MODEL = 'loading_model',
  SEPARATING = 'separating',
  COLLECTING = 'collecting',
  DONE = 'done'
}

export const SUPPORTED_MODELS = ['demucs'] as const;

export type ModelName = typeof SUPPORTED_MODELS[number];

export function isSupportedModel(name: string): name is ModelName {
  return SUPPORTED_MODELS.some(model => model === name);
}

export type DevicePlacement = 'cpu' | 'gpu';

/** Stem name (vocals, drums, ...) to absolute output file path */
export type StemMap = Record<string, string>;

export interface SeparationJob {
  jobId: string;
  status: JobStatus;
  filePath: string;
  stemCount: number;
  model: ModelName;
  progress: number;
  currentStage: JobStage;
  result: StemMap | null;
  error: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

export interface DeviceInfo {
  gpuAvailable: boolean;
  gpuName?: string;
  memoryFreeMb?: number;
  memoryTotalMb?: number;
}

export type LoadOutcome = 'loaded' | 'already_loaded';
export type UnloadOutcome = 'unloaded' | 'not_found';
export type CancelOutcome = 'cancelled' | 'not_found';

export interface ModelSlotSnapshot {
  model: ModelName;
  loaded: boolean;
  device: DevicePlacement | null;
  loadedAt: string | null;
  activeJobs: number;
}

export interface HealthReport {
  status: 'ok';
  gpuAvailable: boolean;
  device: string | null;
  models: ModelSlotSnapshot[];
  /** Jobs waiting for a worker and jobs being separated */
  queue: { pending: number; running: number };
}
