import { spawn } from 'child_process';
import readline from 'readline';
import { Readable, Writable } from 'stream';
import { logger, errorMessage } from '../utils/logger.js';
import { DevicePlacement, ModelName } from '../types/index.js';
import { ModelBackend, ModelHandle } from './ModelBackend.js';

const STDERR_TAIL_LIMIT = 2000;

/**
 * The parts of a child process the backend relies on
 */
export interface ResidentProcess {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnResidentProcess = (command: string, args: string[]) => ResidentProcess;

export interface ResidentProcessBackendOptions {
  pythonBin: string;
  scriptPath: string;
  modelVariant: string;
  loadTimeoutMs: number;
  releaseTimeoutMs?: number;
  spawnProcess?: SpawnResidentProcess;
}

const defaultSpawn: SpawnResidentProcess = (command, args) =>
  spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

class ResidentModelHandle implements ModelHandle {
  readonly modelName: ModelName;
  readonly device: DevicePlacement;
  readonly loadedAt: Date;
  readonly process: ResidentProcess;

  constructor(modelName: ModelName, device: DevicePlacement, process: ResidentProcess) {
    this.modelName = modelName;
    this.device = device;
    this.loadedAt = new Date();
    this.process = process;
  }

  get alive(): boolean {
    return this.process.exitCode === null && this.process.signalCode === null;
  }
}

/**
 * Holds each model in its own long-lived engine process. The weights stay on the
 * device for as long as the process lives; ending the process is what returns
 * the device memory.
 */
export class ResidentProcessBackend implements ModelBackend {
  private pythonBin: string;
  private scriptPath: string;
  private modelVariant: string;
  private loadTimeoutMs: number;
  private releaseTimeoutMs: number;
  private spawnProcess: SpawnResidentProcess;

  constructor(options: ResidentProcessBackendOptions) {
    this.pythonBin = options.pythonBin;
    this.scriptPath = options.scriptPath;
    this.modelVariant = options.modelVariant;
    this.loadTimeoutMs = options.loadTimeoutMs;
    this.releaseTimeoutMs = options.releaseTimeoutMs ?? 10000;
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
  }

  load(modelName: ModelName, device: DevicePlacement): Promise<ModelHandle> {
    const loadTimeoutMs = this.loadTimeoutMs;

    return new Promise<ModelHandle>((resolve, reject) => {
      const child = this.spawnProcess(this.pythonBin, [this.scriptPath, this.modelVariant, device]);
      let stderrTail = '';
      let settled = false;

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new Error(`Model ${modelName} did not become ready within ${loadTimeoutMs} ms`));
        child.kill('SIGKILL');
      }, loadTimeoutMs);

      const lines = readline.createInterface({ input: child.stdout });
      lines.on('line', line => {
        if (!settled && line.trim() === 'ready') {
          settled = true;
          clearTimeout(timer);
          logger.debug(`Resident process for ${modelName} ready`, { pid: child.pid, device });
          resolve(new ResidentModelHandle(modelName, device, child));
          return;
        }
        logger.debug(`[${modelName}] ${line}`);
      });

      child.stderr.on('data', (chunk: Buffer | string) => {
        stderrTail = (stderrTail + String(chunk)).slice(-STDERR_TAIL_LIMIT);
      });

      child.once('error', error => fail(error));

      child.once('exit', (code, signal) => {
        lines.close();
        if (!settled) {
          const reason = signal ? `signal ${signal}` : `exit code ${code}`;
          fail(new Error(`Model process for ${modelName} exited before it was ready (${reason}): ${stderrTail.trim()}`));
          return;
        }
        logger.info(`Resident process for ${modelName} exited`, { pid: child.pid, code, signal });
      });
    });
  }

  async release(handle: ModelHandle): Promise<void> {
    if (!(handle instanceof ResidentModelHandle)) {
      throw new Error(`Handle for ${handle.modelName} was not created by this backend`);
    }

    const child = handle.process;
    if (!handle.alive) {
      return;
    }

    await new Promise<void>(resolve => {
      const timer = setTimeout(() => {
        logger.warn(`Resident process for ${handle.modelName} ignored shutdown, killing it`, { pid: child.pid });
        child.kill('SIGKILL');
      }, this.releaseTimeoutMs);

      child.once('exit', () => {
        clearTimeout(timer);
        resolve();
      });

      // The process may die before the close reaches it; its exit still resolves
      child.stdin.once('error', error => {
        logger.debug(`Resident process for ${handle.modelName} stdin error: ${errorMessage(error)}`);
      });

      // Closing stdin lets the process free the weights and exit on its own
      child.stdin.end();
    });
  }
}
