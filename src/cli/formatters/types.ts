import type { CreateOutcome, ParseOutcome } from '../../core/runner/types.js';

/**
 * Output formatter for command results.
 */
export interface IFormatter {
  formatParse(result: ParseOutcome): string;
  formatCreate(result: CreateOutcome, dryRun: boolean): string;
}
