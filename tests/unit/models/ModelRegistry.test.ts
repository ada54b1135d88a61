import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { ModelRegistry } from '../../../src/models/ModelRegistry.js';
import { UnsupportedModelError } from '../../../src/errors/SidecarError.js';
import { FakeDeviceProbe, FakeModelBackend, delay } from '../../utils/testHelpers.js';

jest.mock('../../../src/utils/logger.js', () => {
  const mockLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  return {
    logger: mockLogger,
    getJobLogger: jest.fn(() => mockLogger),
    errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error))
  };
});

describe('ModelRegistry', () => {
  let backend: FakeModelBackend;
  let probe: FakeDeviceProbe;
  let registry: ModelRegistry;

  beforeEach(() => {
    backend = new FakeModelBackend();
    probe = new FakeDeviceProbe();
    registry = new ModelRegistry(backend, probe);
  });

  describe('load', () => {
    it('should load once and report already_loaded afterwards', async () => {
      await expect(registry.load('demucs')).resolves.toBe('loaded');
      await expect(registry.load('demucs')).resolves.toBe('already_loaded');

      expect(backend.loads).toHaveLength(1);
      expect(backend.loads[0].device).toBe('gpu');
      expect(registry.snapshot()[0].loaded).toBe(true);
    });

    it('should reject unsupported model names', async () => {
      await expect(registry.load('spleeter')).rejects.toBeInstanceOf(UnsupportedModelError);
      await expect(registry.load('spleeter')).rejects.toThrow('Model not supported: spleeter');
      expect(backend.loads).toHaveLength(0);
    });

    it('should serialize concurrent loads of the same model', async () => {
      backend.loadDelayMs = 20;

      const outcomes = await Promise.all([registry.load('demucs'), registry.load('demucs')]);

      expect(outcomes).toEqual(['loaded', 'already_loaded']);
      expect(backend.loads).toHaveLength(1);
    });

    it('should place the model on CPU when no GPU is available at load time', async () => {
      await registry.load('demucs');
      await registry.unload('demucs');

      probe.info = { gpuAvailable: false };
      await registry.load('demucs');

      expect(backend.loads.map(handle => handle.device)).toEqual(['gpu', 'cpu']);
      expect(probe.probeCount).toBe(2);
    });

    it('should leave the slot empty when loading fails', async () => {
      backend.failNextLoad = new Error('CUDA out of memory');

      await expect(registry.load('demucs')).rejects.toThrow('CUDA out of memory');
      expect(registry.snapshot()[0].loaded).toBe(false);
      await expect(registry.load('demucs')).resolves.toBe('loaded');
    });
  });

  describe('ensureLoaded', () => {
    it('should materialize a single instance for concurrent callers', async () => {
      backend.loadDelayMs = 20;

      const handles = await Promise.all([
        registry.ensureLoaded('demucs'),
        registry.ensureLoaded('demucs'),
        registry.ensureLoaded('demucs')
      ]);

      expect(backend.loads).toHaveLength(1);
      expect(handles[1]).toBe(handles[0]);
      expect(handles[2]).toBe(handles[0]);
    });

    it('should reload an instance that went away', async () => {
      const first = await registry.ensureLoaded('demucs');
      backend.loads[0].alive = false;

      const second = await registry.ensureLoaded('demucs');

      expect(second).not.toBe(first);
      expect(backend.loads).toHaveLength(2);
    });
  });

  describe('unload', () => {
    it('should report not_found for a model that was never loaded', async () => {
      await expect(registry.unload('demucs')).resolves.toBe('not_found');
      expect(backend.releases).toHaveLength(0);
    });

    it('should report not_found for an unsupported model', async () => {
      await expect(registry.unload('spleeter')).resolves.toBe('not_found');
    });

    it('should release the instance so a later load succeeds', async () => {
      await registry.load('demucs');

      await expect(registry.unload('demucs')).resolves.toBe('unloaded');
      expect(backend.releases).toHaveLength(1);
      expect(registry.snapshot()[0].loaded).toBe(false);

      await expect(registry.load('demucs')).resolves.toBe('loaded');
      expect(backend.loads).toHaveLength(2);
    });

    it('should be idempotent', async () => {
      await registry.load('demucs');

      await expect(registry.unload('demucs')).resolves.toBe('unloaded');
      await expect(registry.unload('demucs')).resolves.toBe('not_found');
      expect(backend.releases).toHaveLength(1);
    });

    it('should wait for running jobs to release their lease', async () => {
      const lease = await registry.acquire('demucs');
      let settled = false;
      const unloading = registry.unload('demucs').then(outcome => {
        settled = true;
        return outcome;
      });

      await delay(20);
      expect(settled).toBe(false);
      expect(backend.releases).toHaveLength(0);

      lease.release();

      await expect(unloading).resolves.toBe('unloaded');
      expect(backend.releases).toHaveLength(1);
    });
  });

  describe('acquire', () => {
    it('should lazily load and count active jobs', async () => {
      const lease = await registry.acquire('demucs');

      expect(backend.loads).toHaveLength(1);
      expect(lease.handle.device).toBe('gpu');
      expect(registry.snapshot()).toEqual([
        {
          model: 'demucs',
          loaded: true,
          device: 'gpu',
          loadedAt: lease.handle.loadedAt.toISOString(),
          activeJobs: 1
        }
      ]);

      lease.release();
      lease.release();
      expect(registry.snapshot()[0].activeJobs).toBe(0);
    });
  });

  describe('unloadAll', () => {
    it('should release models without waiting for leases', async () => {
      await registry.acquire('demucs');

      await registry.unloadAll();

      expect(backend.releases).toHaveLength(1);
      expect(registry.snapshot()[0]).toMatchObject({ loaded: false, device: null, loadedAt: null });
    });

    it('should not queue behind an unload that is waiting for a running job', async () => {
      const lease = await registry.acquire('demucs');
      const unloading = registry.unload('demucs');
      await delay(10);

      let finished = false;
      const shutdown = registry.unloadAll().then(() => {
        finished = true;
      });
      await delay(50);

      expect(finished).toBe(true);
      expect(backend.releases).toHaveLength(1);
      await expect(unloading).resolves.toBe('unloaded');
      await shutdown;

      lease.release();
      expect(registry.snapshot()[0].activeJobs).toBe(0);
    });
  });
});
