import { Command } from 'commander';
import { BatchSummary } from './interfaces/conversion.interface';
import { ProfileConverter } from './services/converter.service';
import { DEFAULT_OUTPUT_DIR, resolveConverterConfig } from './utils/config.util';
import { isSystemError } from './utils/errors.util';
import { printOutcome, printProgress, printSummary } from './utils/status-formatter.util';

export interface CliOptions {
  inputDir?: string;
  outputDir: string;
  strictNames: boolean;
  quiet: boolean;
}

/**
 * Exit code for a failure outside the per-file conversions: the OS error number when there is one
 */
export function exitCodeFor(error: unknown): number {
  if (isSystemError(error) && typeof error.errno === 'number' && error.errno !== 0) {
    return Math.abs(error.errno);
  }
  return 1;
}

/**
 * Converts the given profiles, or every profile of options.inputDir.
 * Per-file failures are reported but do not change the exit code.
 * @returns Process exit code
 */
export async function runConversion(profiles: string[], options: CliOptions): Promise<number> {
  const config = resolveConverterConfig({
    outputDir: options.outputDir,
    fileNamePolicy: options.strictNames ? 'strict' : 'iwd'
  });
  const converter = new ProfileConverter(config, {
    onOutcome: outcome => printOutcome(outcome, options.quiet)
  });

  let summary: BatchSummary;
  if (options.inputDir) {
    printProgress(`Reading profiles from ${options.inputDir}`, 'folder', options.quiet);
    try {
      summary = await converter.convertDirectory(options.inputDir);
    } catch (error) {
      console.error(`Failed to read profiles from ${options.inputDir}:`, error instanceof Error ? error.message : error);
      return exitCodeFor(error);
    }
  } else {
    for (const profile of profiles) {
      printProgress(`Reading profile ${profile}`, 'profile', options.quiet);
    }
    summary = await converter.convertFiles(profiles);
  }

  printSummary(summary, options.quiet);
  return 0;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('netctl2iwd')
    .description('Convert netctl wireless profiles into iwd network files')
    .version('0.1.0')
    .argument('[profiles...]', 'Profile files to process')
    .option('-i, --input-dir <dir>', 'Directory of profiles to process')
    .option('-o, --output-dir <dir>', 'Directory to write iwd network files to', DEFAULT_OUTPUT_DIR)
    .option('--strict-names', 'Hex-encode SSIDs that contain spaces', false)
    .option('-q, --quiet', 'Only report failures', false)
    .action(async (profiles: string[], options: CliOptions) => {
      if (options.inputDir && profiles.length > 0) {
        program.error('error: profile files cannot be combined with --input-dir');
      }
      if (!options.inputDir && profiles.length === 0) {
        program.error('error: give profile files or --input-dir');
      }

      process.exitCode = await runConversion(profiles, options);
    });

  return program;
}
