import http from 'http';
import type { Express } from 'express';
import { SidecarConfig } from './config/SidecarConfig.js';
import { DeviceProbe, NvidiaSmiProbe } from './device/DeviceProbe.js';
import { JobQueue } from './jobs/JobQueue.js';
import { JobStore } from './jobs/JobStore.js';
import { ModelBackend } from './models/ModelBackend.js';
import { ModelRegistry } from './models/ModelRegistry.js';
import { ResidentProcessBackend } from './models/ResidentProcessBackend.js';
import { DemucsCliEngine } from './separation/DemucsCliEngine.js';
import { SeparationEngine } from './separation/SeparationEngine.js';
import { SeparationWorker } from './separation/SeparationWorker.js';
import { ServiceFacade } from './services/ServiceFacade.js';
import { createApp } from './http/app.js';
import { logger, errorMessage } from './utils/logger.js';

/**
 * Collaborators that talk to the machine; replaced by fakes in tests
 */
export interface SidecarDependencies {
  deviceProbe?: DeviceProbe;
  modelBackend?: ModelBackend;
  engine?: SeparationEngine;
}

function formatGb(megabytes: number): string {
  return (megabytes / 1024).toFixed(2);
}

export class StemSidecarServer {
  readonly jobStore: JobStore;
  readonly jobQueue: JobQueue;
  readonly modelRegistry: ModelRegistry;
  readonly worker: SeparationWorker;
  readonly facade: ServiceFacade;
  readonly app: Express;
  private config: SidecarConfig;
  private deviceProbe: DeviceProbe;
  private httpServer: http.Server | null = null;
  private pruneTimer: NodeJS.Timeout | null = null;

  constructor(config: SidecarConfig, deps: SidecarDependencies = {}) {
    this.config = config;
    this.deviceProbe = deps.deviceProbe ?? new NvidiaSmiProbe(config.device.nvidiaSmiBin, config.device.probeTimeoutMs);

    const modelBackend = deps.modelBackend ?? new ResidentProcessBackend({
      pythonBin: config.engine.pythonBin,
      scriptPath: config.engine.residentScriptPath,
      modelVariant: config.engine.modelVariant,
      loadTimeoutMs: config.engine.loadTimeoutMs
    });
    const engine = deps.engine ?? new DemucsCliEngine({
      pythonBin: config.engine.pythonBin,
      timeoutMs: config.engine.timeoutMs
    });

    this.jobStore = new JobStore();
    this.jobQueue = new JobQueue(config.jobs.maxConcurrent);
    this.modelRegistry = new ModelRegistry(modelBackend, this.deviceProbe);
    this.worker = new SeparationWorker(this.jobQueue, this.jobStore, this.modelRegistry, engine, {
      modelVariant: config.engine.modelVariant,
      mp3Bitrate: config.engine.mp3Bitrate,
      outputDirPrefix: config.engine.outputDirPrefix
    });
    this.facade = new ServiceFacade({
      jobStore: this.jobStore,
      jobQueue: this.jobQueue,
      modelRegistry: this.modelRegistry,
      deviceProbe: this.deviceProbe
    });
    this.app = createApp(this.facade);
  }

  async start(): Promise<void> {
    logger.info('Stem sidecar starting');
    await this.logDeviceCapability();

    this.worker.start();
    this.startPruning();

    const { host, port } = this.config.server;
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
      server.once('error', reject);
      this.httpServer = server;
    });
    logger.info(`Stem sidecar listening on http://${host}:${port}`);
  }

  /**
   * Stop accepting work, close the listener and release every loaded model
   */
  async close(): Promise<void> {
    logger.info('Stem sidecar stopping, releasing device memory');
    this.worker.stop();

    const dropped = this.jobQueue.clearQueue();
    if (dropped > 0) {
      logger.warn(`Dropped ${dropped} queued job(s) that never started`);
    }

    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }

    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
    }

    try {
      await this.modelRegistry.unloadAll();
    } catch (error) {
      logger.error(`Failed to release models on shutdown: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async logDeviceCapability(): Promise<void> {
    const device = await this.deviceProbe.probe();
    if (device.gpuAvailable) {
      logger.info(`GPU detected: ${device.gpuName}`);
      if (device.memoryFreeMb !== undefined && device.memoryTotalMb !== undefined) {
        logger.info(`VRAM free: ${formatGb(device.memoryFreeMb)} GB of ${formatGb(device.memoryTotalMb)} GB`);
      }
    } else {
      logger.warn('No GPU detected, running in CPU mode (slow)');
    }
  }

  private startPruning(): void {
    const { retentionMinutes, pruneIntervalMs } = this.config.jobs;
    if (retentionMinutes <= 0 || this.pruneTimer) return;

    const retentionMs = retentionMinutes * 60 * 1000;
    this.pruneTimer = setInterval(() => {
      this.jobStore.pruneFinished(retentionMs);
    }, pruneIntervalMs);
    this.pruneTimer.unref();
  }
}
