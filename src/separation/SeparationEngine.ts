import { DevicePlacement } from '../types/index.js';

/** Encoding of the stem files the engine writes */
export const STEM_EXTENSION = 'mp3';

export interface SeparationRequest {
  filePath: string;
  outputDir: string;
  modelVariant: string;
  device: DevicePlacement;
  mp3Bitrate: number;
}

export type ProgressListener = (percent: number) => void;

/**
 * Opaque external separation engine. Resolves once the stems are on disk under
 * `<outputDir>/<modelVariant>/<input base name>/<stem>.<STEM_EXTENSION>`.
 */
export interface SeparationEngine {
  separate(request: SeparationRequest, onProgress?: ProgressListener): Promise<void>;
}
