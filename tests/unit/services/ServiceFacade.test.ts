import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { JobQueue } from '../../../src/jobs/JobQueue.js';
import { JobStore } from '../../../src/jobs/JobStore.js';
import { ModelRegistry } from '../../../src/models/ModelRegistry.js';
import { SeparationWorker } from '../../../src/separation/SeparationWorker.js';
import { ServiceFacade } from '../../../src/services/ServiceFacade.js';
import {
  ENGINE_CRASH_HINT,
  EngineFailureError,
  NotFoundError,
  UnsupportedModelError
} from '../../../src/errors/SidecarError.js';
import { JobStatus } from '../../../src/types/index.js';
import {
  FakeDeviceProbe,
  FakeModelBackend,
  FakeSeparationEngine,
  createInputFile,
  createTempDir,
  expectedStems,
  removeTempDir,
  waitForStatus,
  waitUntil
} from '../../utils/testHelpers.js';

jest.mock('../../../src/utils/logger.js', () => {
  const mockLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  return {
    logger: mockLogger,
    getJobLogger: jest.fn(() => mockLogger),
    errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error))
  };
});

describe('ServiceFacade', () => {
  let tempDir: string;
  let jobStore: JobStore;
  let jobQueue: JobQueue;
  let backend: FakeModelBackend;
  let probe: FakeDeviceProbe;
  let registry: ModelRegistry;
  let engine: FakeSeparationEngine;
  let worker: SeparationWorker;
  let facade: ServiceFacade;

  beforeEach(async () => {
    tempDir = await createTempDir();
    jobStore = new JobStore();
    jobQueue = new JobQueue();
    backend = new FakeModelBackend();
    probe = new FakeDeviceProbe();
    registry = new ModelRegistry(backend, probe);
    engine = new FakeSeparationEngine();
    worker = new SeparationWorker(jobQueue, jobStore, registry, engine, {
      modelVariant: 'htdemucs',
      mp3Bitrate: 320,
      outputDirPrefix: 'stems_'
    });
    facade = new ServiceFacade({ jobStore, jobQueue, modelRegistry: registry, deviceProbe: probe });
    worker.start();
  });

  afterEach(async () => {
    worker.stop();
    await waitUntil(() => jobQueue.getActiveCount() === 0);
    await removeTempDir(tempDir);
  });

  describe('health', () => {
    it('should report GPU capability and model state', async () => {
      await facade.loadModel('demucs');

      const report = await facade.health();

      expect(report).toMatchObject({ status: 'ok', gpuAvailable: true, device: 'Test GPU' });
      expect(report.models).toEqual([expect.objectContaining({ model: 'demucs', loaded: true, device: 'gpu' })]);
    });

    it('should report a null device without a GPU', async () => {
      probe.info = { gpuAvailable: false };

      await expect(facade.health()).resolves.toEqual({
        status: 'ok',
        gpuAvailable: false,
        device: null,
        models: [{ model: 'demucs', loaded: false, device: null, loadedAt: null, activeJobs: 0 }],
        queue: { pending: 0, running: 0 }
      });
    });
  });

  describe('models', () => {
    it('should load once and report already_loaded afterwards', async () => {
      await expect(facade.loadModel('demucs')).resolves.toEqual({ status: 'loaded' });
      await expect(facade.loadModel('demucs')).resolves.toEqual({ status: 'already_loaded' });
      expect(backend.loads).toHaveLength(1);
    });

    it('should reject unsupported models on load', async () => {
      await expect(facade.loadModel('spleeter')).rejects.toBeInstanceOf(UnsupportedModelError);
    });

    it('should unload so that a later load succeeds', async () => {
      await expect(facade.unloadModel('demucs')).resolves.toEqual({ status: 'not_found' });

      await facade.loadModel('demucs');
      await expect(facade.unloadModel('demucs')).resolves.toEqual({ status: 'unloaded' });
      await expect(facade.loadModel('demucs')).resolves.toEqual({ status: 'loaded' });
    });
  });

  describe('separation jobs', () => {
    it('should return a pending job immediately and complete it with four stems', async () => {
      const filePath = await createInputFile(tempDir, 'song.wav');

      const submitted = facade.submitSeparation({ filePath });

      expect(submitted.status).toBe(JobStatus.PENDING);
      expect(facade.getJob(submitted.jobId).status).toBe(JobStatus.PENDING);

      const job = await waitForStatus(jobStore, submitted.jobId, [JobStatus.COMPLETED, JobStatus.FAILED]);
      expect(job.status).toBe(JobStatus.COMPLETED);
      expect(job.result).toEqual(expectedStems(tempDir, submitted.jobId, 'song'));
      expect(job.stemCount).toBe(4);
    });

    it('should fail a corrupt file with a hint about codecs or format', async () => {
      const filePath = await createInputFile(tempDir, 'corrupt.wav');
      engine.behavior = async () => {
        throw new EngineFailureError(1, null, 'Could not load file');
      };

      const { jobId } = facade.submitSeparation({ filePath });
      const job = await waitForStatus(jobStore, jobId, [JobStatus.COMPLETED, JobStatus.FAILED]);

      expect(job.status).toBe(JobStatus.FAILED);
      expect(job.error).toBe(ENGINE_CRASH_HINT);
      expect(job.result).toBeNull();
    });

    it('should keep a job cancelled right after submission cancelled for good', async () => {
      const filePath = await createInputFile(tempDir, 'song.wav');

      const { jobId } = facade.submitSeparation({ filePath });
      expect(facade.cancelJob(jobId)).toEqual({ status: 'cancelled' });

      await waitUntil(() => jobQueue.getQueueLength() === 0 && jobQueue.getActiveCount() === 0);

      expect(facade.getJob(jobId).status).toBe(JobStatus.CANCELLED);
      expect(engine.calls).toHaveLength(0);
    });

    it('should never report a status that moves backwards', async () => {
      const filePath = await createInputFile(tempDir, 'song.wav');
      const order = [JobStatus.PENDING, JobStatus.PROCESSING, JobStatus.COMPLETED];
      const seen: JobStatus[] = [];

      const { jobId } = facade.submitSeparation({ filePath });
      while (seen[seen.length - 1] !== JobStatus.COMPLETED) {
        seen.push(facade.getJob(jobId).status);
        await new Promise(resolve => setImmediate(resolve));
      }

      const ranks = seen.map(status => order.indexOf(status));
      expect(ranks.every(rank => rank >= 0)).toBe(true);
      expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
    });

    it('should throw NotFoundError for unknown jobs', () => {
      expect(() => facade.getJob('unknown-job')).toThrow(NotFoundError);
      expect(() => facade.cancelJob('unknown-job')).toThrow('Job not found');
    });
  });
});
