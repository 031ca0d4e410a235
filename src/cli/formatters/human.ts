/**
 * Human-readable output formatter with colors.
 */
import chalk from 'chalk';
import type { CreateOutcome, ParseOutcome } from '../../core/runner/types.js';
import type { IFormatter } from './types.js';

export class HumanFormatter implements IFormatter {
  formatParse(result: ParseOutcome): string {
    const lines: string[] = [];
    lines.push(chalk.dim(`Template ${result.template} at ${result.mountPoint}`));
    lines.push(chalk.dim(`Path ${result.segments.join('/')}`));

    if (result.matches.length === 0) {
      lines.push('');
      lines.push('Structure matches, no variables bound');
      return lines.join('\n');
    }

    result.matches.forEach((bindings, index) => {
      lines.push('');
      lines.push(chalk.bold(`Match ${index + 1}`));
      const width = Math.max(...Object.keys(bindings).map((name) => name.length));
      for (const [name, value] of Object.entries(bindings)) {
        lines.push(`  ${chalk.cyan(name.padEnd(width))}  ${value}`);
      }
    });
    return lines.join('\n');
  }

  formatCreate(result: CreateOutcome, dryRun: boolean): string {
    const lines: string[] = [];

    if (dryRun) {
      lines.push(chalk.bold(`Dry Run - Would create in ${result.root}:`));
      lines.push('');
      for (const entry of result.planned) {
        lines.push(`  ${entry.relative}${entry.folder ? '/' : ''}`);
      }
    } else {
      lines.push(chalk.bold(`${result.template} in ${result.root}`));
      lines.push(
        `  ${chalk.green(`${result.created.length} created`)}, ` +
        `${chalk.dim(`${result.existing.length} already present`)}, ` +
        `${chalk.yellow(`${result.skipped.length} skipped`)}`
      );
    }

    if (result.skipped.length > 0) {
      lines.push('');
      lines.push(chalk.yellow('Skipped (missing values):'));
      for (const skipped of result.skipped) {
        lines.push(`  ${skipped}`);
      }
    }
    return lines.join('\n');
  }
}
