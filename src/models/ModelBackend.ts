import { DevicePlacement, ModelName } from '../types/index.js';

/**
 * An instance of a model materialized on a device
 */
export interface ModelHandle {
  readonly modelName: ModelName;
  readonly device: DevicePlacement;
  readonly loadedAt: Date;
  /** false once the instance has gone away outside of `release` */
  readonly alive: boolean;
}

/**
 * Materializes and releases model instances. `release` must not resolve until
 * the device memory held by the handle has been returned.
 */
export interface ModelBackend {
  load(modelName: ModelName, device: DevicePlacement): Promise<ModelHandle>;
  release(handle: ModelHandle): Promise<void>;
}
