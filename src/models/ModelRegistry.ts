import { logger } from '../utils/logger.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';
import { DeviceProbe } from '../device/DeviceProbe.js';
import { UnsupportedModelError } from '../errors/SidecarError.js';
import {
  DevicePlacement,
  LoadOutcome,
  ModelName,
  ModelSlotSnapshot,
  SUPPORTED_MODELS,
  UnloadOutcome,
  isSupportedModel
} from '../types/index.js';
import { ModelBackend, ModelHandle } from './ModelBackend.js';

interface ModelSlot {
  handle: ModelHandle | null;
  activeLeases: number;
  drainWaiters: Array<() => void>;
}

/**
 * A job's claim on a resident model. Unload waits until every lease is released.
 */
export interface ModelLease {
  readonly handle: ModelHandle;
  release(): void;
}

export interface UnloadOptions {
  /** Wait for jobs holding a lease before releasing (default true) */
  waitForJobs?: boolean;
}

/**
 * Owns the loaded model instances. Check-and-load and unload for a given model
 * name run under a per-name lock, so a slot is never materialized twice.
 */
export class ModelRegistry {
  private slots: Map<ModelName, ModelSlot> = new Map();
  private locks = new KeyedMutex<ModelName>();
  private backend: ModelBackend;
  private deviceProbe: DeviceProbe;

  constructor(backend: ModelBackend, deviceProbe: DeviceProbe, models: readonly ModelName[] = SUPPORTED_MODELS) {
    this.backend = backend;
    this.deviceProbe = deviceProbe;
    for (const model of models) {
      this.slots.set(model, { handle: null, activeLeases: 0, drainWaiters: [] });
    }
  }

  async load(modelName: string): Promise<LoadOutcome> {
    const [name, slot] = this.requireSlot(modelName);

    return this.locks.runExclusive(name, async () => {
      if (this.residentHandle(name, slot)) {
        logger.debug(`Model ${name} already loaded`);
        return 'already_loaded';
      }
      await this.materialize(name, slot);
      return 'loaded';
    });
  }

  /**
   * Return the resident instance, loading it first if needed
   */
  async ensureLoaded(modelName: string): Promise<ModelHandle> {
    const [name, slot] = this.requireSlot(modelName);

    return this.locks.runExclusive(name, async () => {
      return this.residentHandle(name, slot) ?? this.materialize(name, slot);
    });
  }

  async acquire(modelName: string): Promise<ModelLease> {
    const [name, slot] = this.requireSlot(modelName);

    return this.locks.runExclusive(name, async () => {
      const handle = this.residentHandle(name, slot) ?? (await this.materialize(name, slot));
      slot.activeLeases++;

      let released = false;
      return {
        handle,
        release: () => {
          if (released) return;
          released = true;
          slot.activeLeases--;
          if (slot.activeLeases === 0) {
            this.wakeDrainWaiters(slot);
          }
        }
      };
    });
  }

  async unload(modelName: string, options: UnloadOptions = {}): Promise<UnloadOutcome> {
    if (!isSupportedModel(modelName)) {
      return 'not_found';
    }
    const slot = this.slots.get(modelName);
    if (!slot) {
      return 'not_found';
    }
    const waitForJobs = options.waitForJobs ?? true;

    return this.locks.runExclusive(modelName, async () => {
      if (!slot.handle) {
        return 'not_found';
      }

      if (waitForJobs && slot.activeLeases > 0) {
        logger.info(`Unload of ${modelName} waiting for ${slot.activeLeases} running job(s)`);
        await new Promise<void>(resolve => slot.drainWaiters.push(resolve));
      }
      if (slot.activeLeases > 0) {
        logger.warn(`Releasing ${modelName} while ${slot.activeLeases} job(s) still hold it`);
      }

      const handle = slot.handle;
      slot.handle = null;
      await this.backend.release(handle);
      logger.info(`Model ${modelName} unloaded from ${handle.device}`);
      return 'unloaded';
    });
  }

  /**
   * Release every resident model without waiting for running jobs. Unloads
   * already waiting on a model stop waiting and release it right away.
   */
  async unloadAll(): Promise<void> {
    for (const [name, slot] of this.slots) {
      this.wakeDrainWaiters(slot);
      await this.unload(name, { waitForJobs: false });
    }
  }

  snapshot(): ModelSlotSnapshot[] {
    return Array.from(this.slots.entries()).map(([model, slot]) => ({
      model,
      loaded: slot.handle?.alive ?? false,
      device: slot.handle?.device ?? null,
      loadedAt: slot.handle ? slot.handle.loadedAt.toISOString() : null,
      activeJobs: slot.activeLeases
    }));
  }

  private wakeDrainWaiters(slot: ModelSlot): void {
    const waiters = slot.drainWaiters.splice(0);
    waiters.forEach(wake => wake());
  }

  private requireSlot(modelName: string): [ModelName, ModelSlot] {
    if (!isSupportedModel(modelName)) {
      throw new UnsupportedModelError(modelName);
    }
    const slot = this.slots.get(modelName);
    if (!slot) {
      throw new UnsupportedModelError(modelName);
    }
    return [modelName, slot];
  }

  private residentHandle(name: ModelName, slot: ModelSlot): ModelHandle | null {
    if (slot.handle && !slot.handle.alive) {
      logger.warn(`Model ${name} instance on ${slot.handle.device} is gone, it will be reloaded`);
      slot.handle = null;
    }
    return slot.handle;
  }

  private async materialize(name: ModelName, slot: ModelSlot): Promise<ModelHandle> {
    const deviceInfo = await this.deviceProbe.probe();
    const device: DevicePlacement = deviceInfo.gpuAvailable ? 'gpu' : 'cpu';

    logger.info(`Loading model ${name} on ${device}`, {
      gpuName: deviceInfo.gpuName,
      memoryFreeMb: deviceInfo.memoryFreeMb
    });
    const startedAt = Date.now();
    const handle = await this.backend.load(name, device);
    slot.handle = handle;
    logger.info(`Model ${name} loaded on ${device} in ${Date.now() - startedAt} ms`);
    return handle;
  }
}
