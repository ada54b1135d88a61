import { spawn } from 'child_process';
import { Readable } from 'stream';
import { logger } from '../utils/logger.js';
import { EngineFailureError, EngineTimeoutError } from '../errors/SidecarError.js';
import { ProgressListener, SeparationEngine, SeparationRequest } from './SeparationEngine.js';

const STDERR_TAIL_LIMIT = 4000;
const PROGRESS_PATTERN = /(\d{1,3}(?:\.\d+)?)%\|/g;

/**
 * The parts of a child process the engine relies on
 */
export interface EngineProcess {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnEngineProcess = (command: string, args: string[]) => EngineProcess;

export interface DemucsCliEngineOptions {
  pythonBin: string;
  /** 0 disables the timeout */
  timeoutMs?: number;
  spawnProcess?: SpawnEngineProcess;
}

/**
 * Arguments for `python -m demucs.separate`
 */
export function buildDemucsArgs(request: SeparationRequest): string[] {
  return [
    '-m', 'demucs.separate',
    '-n', request.modelVariant,
    '-o', request.outputDir,
    '--device', request.device === 'gpu' ? 'cuda' : 'cpu',
    '--mp3',
    '--mp3-bitrate', String(request.mp3Bitrate),
    request.filePath
  ];
}

/**
 * Last progress percentage in a chunk of engine stderr (tqdm bars redraw with \r)
 * @returns null if the chunk carries no progress bar
 */
export function parseProgress(chunk: string): number | null {
  let percent: number | null = null;
  for (const match of chunk.matchAll(PROGRESS_PATTERN)) {
    const value = Number(match[1]);
    if (Number.isFinite(value) && value <= 100) {
      percent = value;
    }
  }
  return percent;
}

const defaultSpawn: SpawnEngineProcess = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export class DemucsCliEngine implements SeparationEngine {
  private pythonBin: string;
  private timeoutMs: number;
  private spawnProcess: SpawnEngineProcess;

  constructor(options: DemucsCliEngineOptions) {
    this.pythonBin = options.pythonBin;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
  }

  separate(request: SeparationRequest, onProgress?: ProgressListener): Promise<void> {
    const args = buildDemucsArgs(request);
    logger.info(`Separating ${request.filePath}`, { device: request.device, outputDir: request.outputDir });
    logger.debug(`${this.pythonBin} ${args.join(' ')}`);

    return new Promise<void>((resolve, reject) => {
      const child = this.spawnProcess(this.pythonBin, args);
      let stderrTail = '';
      let timedOut = false;
      let settled = false;

      const timer = this.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            logger.warn(`Separation of ${request.filePath} exceeded ${this.timeoutMs} ms, stopping engine`);
            child.kill('SIGKILL');
          }, this.timeoutMs)
        : null;

      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      child.stderr.on('data', (chunk: Buffer | string) => {
        const text = String(chunk);
        stderrTail = (stderrTail + text).slice(-STDERR_TAIL_LIMIT);
        const percent = parseProgress(text);
        if (percent !== null && onProgress) {
          onProgress(percent);
        }
      });

      child.stdout.on('data', (chunk: Buffer | string) => {
        logger.debug(`[engine] ${String(chunk).trim()}`);
      });

      child.on('error', error => settle(error));

      child.on('close', (code, signal) => {
        if (timedOut) {
          settle(new EngineTimeoutError(this.timeoutMs));
          return;
        }
        if (code === 0) {
          settle();
          return;
        }
        logger.error(`Separation engine failed for ${request.filePath}`, {
          code,
          signal,
          stderr: stderrTail.trim()
        });
        settle(new EngineFailureError(code, signal, stderrTail.trim()));
      });
    });
  }
}
