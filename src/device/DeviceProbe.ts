import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger, errorMessage } from '../utils/logger.js';
import { DeviceInfo } from '../types/index.js';

const execFileAsync = promisify(execFile);

/**
 * Reports accelerator availability. Implementations are queried at call time,
 * never cached, since a GPU can appear or disappear while the process runs.
 */
export interface DeviceProbe {
  probe(): Promise<DeviceInfo>;
}

/**
 * Parse `nvidia-smi --query-gpu=name,memory.free,memory.total --format=csv,noheader,nounits`.
 * Only the first GPU is reported.
 */
export function parseNvidiaSmiOutput(stdout: string): DeviceInfo {
  const firstLine = stdout
    .split(/\r?\n/)
    .map(line => line.trim())
    .find(line => line.length > 0);

  if (!firstLine) {
    return { gpuAvailable: false };
  }

  const parts = firstLine.split(',').map(part => part.trim());
  if (parts.length < 3) {
    return { gpuAvailable: false };
  }

  const [gpuName, free, total] = parts;
  const memoryFreeMb = Number(free);
  const memoryTotalMb = Number(total);
  if (!gpuName || !Number.isFinite(memoryFreeMb) || !Number.isFinite(memoryTotalMb)) {
    return { gpuAvailable: false };
  }

  return { gpuAvailable: true, gpuName, memoryFreeMb, memoryTotalMb };
}

export class NvidiaSmiProbe implements DeviceProbe {
  private binary: string;
  private timeoutMs: number;

  constructor(binary: string = 'nvidia-smi', timeoutMs: number = 5000) {
    this.binary = binary;
    this.timeoutMs = timeoutMs;
  }

  async probe(): Promise<DeviceInfo> {
    try {
      const { stdout } = await execFileAsync(
        this.binary,
        ['--query-gpu=name,memory.free,memory.total', '--format=csv,noheader,nounits'],
        { timeout: this.timeoutMs }
      );
      return parseNvidiaSmiOutput(stdout);
    } catch (error) {
      // No driver, no binary or no device: all mean CPU placement
      logger.debug(`GPU probe via ${this.binary} failed, assuming CPU only: ${errorMessage(error)}`);
      return { gpuAvailable: false };
    }
  }
}
