/**
 * Extract template variables from a path below the mount point.
 */
import { Command } from 'commander';
import { AdeRunner } from '../../core/runner/runner.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import { loadSettings, type GlobalOptions } from '../settings.js';

interface ParseOptions extends GlobalOptions {
  path?: string;
  strict?: boolean;
  json?: boolean;
}

/**
 * Create the parse command.
 */
export function createParseCommand(): Command {
  return new Command('parse')
    .description('Parse a path against a template and print the variables it binds')
    .option('--path <path>', 'Path to parse (default: current directory)')
    .option('--strict', 'Require the template to describe every segment of the path')
    .option('--json', 'Output as JSON')
    .action(async (_options: ParseOptions, command: Command) => {
      try {
        await runParse(command.optsWithGlobals<ParseOptions>());
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runParse(options: ParseOptions): Promise<void> {
  const { settings } = await loadSettings(options);
  const outcome = await new AdeRunner(settings).parse(options.path, { strict: options.strict });

  if (outcome.status === 'failed') {
    throw outcome.error;
  }

  console.log(createFormatter(options.json).formatParse(outcome.result));
}
