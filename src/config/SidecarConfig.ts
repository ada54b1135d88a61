import path from 'path';
import cloneDeep from 'lodash/cloneDeep.js';
import merge from 'lodash/merge.js';

/**
 * Centralized configuration for the sidecar
 */
export interface SidecarConfig {
  server: {
    host: string;
    port: number;
  };
  engine: {
    pythonBin: string;
    modelVariant: string;
    mp3Bitrate: number;
    /** 0 disables the timeout */
    timeoutMs: number;
    loadTimeoutMs: number;
    residentScriptPath: string;
    outputDirPrefix: string;
  };
  device: {
    nvidiaSmiBin: string;
    probeTimeoutMs: number;
  };
  jobs: {
    maxConcurrent: number;
    /** 0 keeps finished jobs for the lifetime of the process */
    retentionMinutes: number;
    pruneIntervalMs: number;
  };
}

export type SidecarConfigOverrides = {
  [K in keyof SidecarConfig]?: Partial<SidecarConfig[K]>;
};

export const DEFAULT_SIDECAR_CONFIG: SidecarConfig = {
  server: {
    host: '127.0.0.1',
    port: 8000
  },
  engine: {
    pythonBin: 'python',
    modelVariant: 'htdemucs',
    mp3Bitrate: 320,
    timeoutMs: 0,
    loadTimeoutMs: 300000,
    residentScriptPath: path.join(process.cwd(), 'scripts', 'hold_model.py'),
    outputDirPrefix: 'stems_'
  },
  device: {
    nvidiaSmiBin: 'nvidia-smi',
    probeTimeoutMs: 5000
  },
  jobs: {
    maxConcurrent: 1,
    retentionMinutes: 0,
    pruneIntervalMs: 60000
  }
};

function readInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return Number(raw);
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

/**
 * Overrides taken from environment variables. Unset variables are left undefined
 * so they do not replace defaults when merged.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SidecarConfigOverrides {
  return {
    server: {
      host: readString(env, 'HOST'),
      port: readInt(env, 'PORT')
    },
    engine: {
      pythonBin: readString(env, 'PYTHON_BIN'),
      modelVariant: readString(env, 'DEMUCS_MODEL_VARIANT'),
      mp3Bitrate: readInt(env, 'MP3_BITRATE'),
      timeoutMs: readInt(env, 'ENGINE_TIMEOUT_MS'),
      loadTimeoutMs: readInt(env, 'MODEL_LOAD_TIMEOUT_MS'),
      residentScriptPath: readString(env, 'RESIDENT_SCRIPT_PATH')
    },
    device: {
      nvidiaSmiBin: readString(env, 'NVIDIA_SMI_BIN')
    },
    jobs: {
      maxConcurrent: readInt(env, 'MAX_CONCURRENT_JOBS'),
      retentionMinutes: readInt(env, 'JOB_RETENTION_MINUTES')
    }
  };
}

export class SidecarConfigManager {
  private config: SidecarConfig;

  constructor(...overrides: SidecarConfigOverrides[]) {
    this.config = overrides.reduce<SidecarConfig>(
      (current, override) => this.mergeConfigs(current, override),
      cloneDeep(DEFAULT_SIDECAR_CONFIG)
    );
  }

  /**
   * Get the complete configuration
   */
  getConfig(): SidecarConfig {
    return cloneDeep(this.config);
  }

  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { server, engine, device, jobs } = this.config;

    if (!server.host) {
      errors.push('server.host must not be empty');
    }
    if (!Number.isInteger(server.port) || server.port < 0 || server.port > 65535) {
      errors.push('server.port must be an integer between 0 and 65535');
    }

    if (!engine.pythonBin) {
      errors.push('engine.pythonBin must not be empty');
    }
    if (!engine.modelVariant) {
      errors.push('engine.modelVariant must not be empty');
    }
    if (!Number.isInteger(engine.mp3Bitrate) || engine.mp3Bitrate <= 0) {
      errors.push('engine.mp3Bitrate must be a positive integer');
    }
    if (!Number.isInteger(engine.timeoutMs) || engine.timeoutMs < 0) {
      errors.push('engine.timeoutMs must be 0 or a positive integer');
    }
    if (!Number.isInteger(engine.loadTimeoutMs) || engine.loadTimeoutMs <= 0) {
      errors.push('engine.loadTimeoutMs must be a positive integer');
    }

    if (!device.nvidiaSmiBin) {
      errors.push('device.nvidiaSmiBin must not be empty');
    }

    if (!Number.isInteger(jobs.maxConcurrent) || jobs.maxConcurrent < 1) {
      errors.push('jobs.maxConcurrent must be at least 1');
    }
    if (!Number.isInteger(jobs.retentionMinutes) || jobs.retentionMinutes < 0) {
      errors.push('jobs.retentionMinutes must be 0 or a positive integer');
    }
    if (!Number.isInteger(jobs.pruneIntervalMs) || jobs.pruneIntervalMs <= 0) {
      errors.push('jobs.pruneIntervalMs must be a positive integer');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Deep merge; undefined override values keep the base value
   */
  private mergeConfigs(base: SidecarConfig, override: SidecarConfigOverrides): SidecarConfig {
    return merge(cloneDeep(base), override);
  }
}
