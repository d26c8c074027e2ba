import { BatchSummary, ConversionOutcome } from '../interfaces/conversion.interface';
import { colorize, formatStatusLine, icons } from './display.util';

/**
 * Plain text description of one conversion
 */
export function formatOutcome(outcome: ConversionOutcome): string {
  if (outcome.status === 'converted') {
    return `Successfully converted ${outcome.input} -> ${outcome.output}`;
  }
  return `Failed to convert ${outcome.input}: ${outcome.error.message}`;
}

export function formatSummary(summary: BatchSummary): string {
  const total = summary.converted + summary.failed;
  return `Converted ${summary.converted} of ${total} profile(s)`;
}

/**
 * Prints a conversion result; failures go to stderr and are shown even when quiet
 */
export function printOutcome(outcome: ConversionOutcome, quiet = false): void {
  if (outcome.status === 'failed') {
    console.error(`${icons.failed} ${colorize(formatOutcome(outcome), 'red')}`);
  } else if (!quiet) {
    console.log(`${icons.converted} ${colorize(formatOutcome(outcome), 'green')}`);
  }
}

export function printProgress(message: string, icon: keyof typeof icons, quiet = false): void {
  if (!quiet) {
    console.log(`${icons[icon]} ${colorize(message, 'cyan')}`);
  }
}

export function printSummary(summary: BatchSummary, quiet = false): void {
  if (quiet) return;
  console.log('');
  console.log(formatStatusLine('Summary', formatSummary(summary), undefined, summary.failed > 0 ? 'yellow' : 'green'));
}
