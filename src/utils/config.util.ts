import { FileNamePolicy } from '../interfaces/network.interface';

/** Where iwd keeps its network files */
export const DEFAULT_OUTPUT_DIR = '/var/lib/iwd';

export const FILE_NAME_POLICIES: readonly FileNamePolicy[] = ['iwd', 'strict'];

export interface ConverterConfig {
  outputDir: string;
  fileNamePolicy: FileNamePolicy;
  /** Mode applied to every written file, which may hold secrets */
  fileMode: number;
}

export interface ConverterConfigOverrides {
  outputDir?: string;
  fileNamePolicy?: string;
}

export function isFileNamePolicy(value: string): value is FileNamePolicy {
  return FILE_NAME_POLICIES.some(policy => policy === value);
}

/**
 * Merges command line overrides with the defaults
 * @param overrides Values given by the user; undefined entries keep the default
 * @returns Complete converter settings
 */
export function resolveConverterConfig(overrides: ConverterConfigOverrides = {}): ConverterConfig {
  const fileNamePolicy = overrides.fileNamePolicy ?? 'iwd';
  if (!isFileNamePolicy(fileNamePolicy)) {
    throw new Error(`Unknown file name policy "${fileNamePolicy}" (expected ${FILE_NAME_POLICIES.join(' or ')})`);
  }

  return {
    outputDir: overrides.outputDir || DEFAULT_OUTPUT_DIR,
    fileNamePolicy,
    fileMode: 0o600
  };
}
