import fs, { FileHandle } from 'fs/promises';
import path from 'path';
import { BatchSummary, ConversionOutcome } from '../interfaces/conversion.interface';
import { ConverterConfig, resolveConverterConfig } from '../utils/config.util';
import { ConversionError } from '../utils/errors.util';
import { serializeIwdConfig } from '../utils/iwd-config.util';
import { buildIwdConfig, networkFileName } from './network.service';
import { parseNetwork } from './profile-parser.service';

export interface ProfileConverterOptions {
  /** Called as soon as each file of a batch has been handled */
  onOutcome?: (outcome: ConversionOutcome) => void;
}

export class ProfileConverter {
  private config: ConverterConfig;
  private onOutcome?: (outcome: ConversionOutcome) => void;

  constructor(config: ConverterConfig = resolveConverterConfig(), options: ProfileConverterOptions = {}) {
    this.config = config;
    this.onOutcome = options.onOutcome;
  }

  /**
   * Converts one netctl profile into an iwd network file inside the output directory.
   * The destination is created exclusively, so an existing file is never overwritten.
   * @param inputPath Profile to read
   * @returns Path of the written file
   * @throws ConversionError
   */
  async convertFile(inputPath: string): Promise<string> {
    let contents: Buffer;
    try {
      contents = await fs.readFile(inputPath);
    } catch (error) {
      throw ConversionError.fromSystemError(error);
    }

    const network = parseNetwork(contents);
    const outputPath = path.join(this.config.outputDir, networkFileName(network, this.config.fileNamePolicy));
    const document = serializeIwdConfig(buildIwdConfig(network));

    let handle: FileHandle;
    try {
      handle = await fs.open(outputPath, 'wx', this.config.fileMode);
    } catch (error) {
      throw ConversionError.fromSystemError(error);
    }

    try {
      // The creation mode is subject to the umask; set it explicitly before any secret is written
      await handle.chmod(this.config.fileMode);
      await handle.writeFile(document, 'utf8');
    } catch (error) {
      await this.discard(handle, outputPath);
      throw ConversionError.fromWriteError(error);
    }

    try {
      await handle.close();
    } catch (error) {
      await this.remove(outputPath);
      throw ConversionError.fromWriteError(error);
    }
    return outputPath;
  }

  /**
   * Converts each profile in turn. A failing file is recorded and the batch goes on;
   * files converted earlier are kept.
   */
  async convertFiles(inputPaths: string[]): Promise<BatchSummary> {
    const summary: BatchSummary = { converted: 0, failed: 0, outcomes: [] };

    for (const input of inputPaths) {
      let outcome: ConversionOutcome;
      try {
        const output = await this.convertFile(input);
        outcome = { input, status: 'converted', output };
        summary.converted++;
      } catch (error) {
        outcome = { input, status: 'failed', error: ConversionError.fromSystemError(error) };
        summary.failed++;
      }

      summary.outcomes.push(outcome);
      this.onOutcome?.(outcome);
    }

    return summary;
  }

  /**
   * Converts every regular file of a directory, in name order.
   * Entries that cannot be inspected are skipped; failing to list the directory throws
   * the underlying system error.
   */
  async convertDirectory(inputDir: string): Promise<BatchSummary> {
    return this.convertFiles(await listProfiles(inputDir));
  }

  private async discard(handle: FileHandle, outputPath: string): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      console.error(`Failed to close ${outputPath}:`, error);
    } finally {
      await this.remove(outputPath);
    }
  }

  private async remove(outputPath: string): Promise<void> {
    try {
      await fs.rm(outputPath, { force: true });
    } catch (error) {
      console.error(`Failed to remove partially written ${outputPath}:`, error);
    }
  }
}

/**
 * Lists the regular files of a directory, following symlinks
 * @param dir Directory holding netctl profiles
 * @returns Paths sorted by file name
 */
export async function listProfiles(dir: string): Promise<string[]> {
  const names = (await fs.readdir(dir)).sort();
  const files: string[] = [];

  for (const name of names) {
    const filePath = path.join(dir, name);
    try {
      const stats = await fs.stat(filePath);
      if (stats.isFile()) {
        files.push(filePath);
      }
    } catch {
      // Dangling links and unreadable entries are not profiles
      continue;
    }
  }

  return files;
}
