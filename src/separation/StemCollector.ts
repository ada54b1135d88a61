import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { StemMap } from '../types/index.js';
import { STEM_EXTENSION } from './SeparationEngine.js';

// fs errors may come from another realm (e.g. under a test VM), so match on shape
function isMissingPath(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Job-scoped output directory next to the input file
 */
export function jobOutputDir(filePath: string, jobId: string, prefix: string = 'stems_'): string {
  return path.join(path.dirname(filePath), `${prefix}${jobId}`);
}

/**
 * Where the engine writes stems: `<outputDir>/<variant>/<input base name>`
 */
export function stemDirectory(outputDir: string, modelVariant: string, filePath: string): string {
  return path.join(outputDir, modelVariant, path.parse(filePath).name);
}

/**
 * Map stem name to absolute path for every `<stem>.<extension>` file the engine
 * produced. A missing directory yields an empty map.
 */
export async function collectStems(
  outputDir: string,
  modelVariant: string,
  filePath: string,
  extension: string = STEM_EXTENSION
): Promise<StemMap> {
  const dir = stemDirectory(outputDir, modelVariant, filePath);

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingPath(error)) {
      return {};
    }
    throw error;
  }

  const suffix = `.${extension}`;
  const stems: StemMap = {};
  entries
    .filter(entry => entry.isFile() && entry.name.endsWith(suffix))
    .map(entry => entry.name)
    .sort()
    .forEach(name => {
      stems[name.slice(0, -suffix.length)] = path.resolve(dir, name);
    });

  return stems;
}
