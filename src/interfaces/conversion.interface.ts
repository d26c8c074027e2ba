import { ConversionError } from '../utils/errors.util';

export type ConversionOutcome =
  | { input: string; status: 'converted'; output: string }
  | { input: string; status: 'failed'; error: ConversionError };

export interface BatchSummary {
  converted: number;
  failed: number;
  outcomes: ConversionOutcome[];
}
