import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConversionError } from '../utils/errors.util';

/**
 * Runs a function expected to fail and returns the conversion error it threw
 */
export function catchConversionError(fn: () => unknown): ConversionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConversionError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConversionError to be thrown');
}

export async function rejectionOf(promise: Promise<unknown>): Promise<ConversionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ConversionError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConversionError rejection');
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `netctl2iwd-${prefix}-`));
}
