/**
 * Look up a template path by its first, last and inner segments.
 */
import { Command } from 'commander';
import { TemplateRegistry } from '../../core/template/registry.js';
import { flattenTemplate } from '../../core/template/resolve.js';
import { findPath } from '../../core/template/find-path.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { loadSettings, type GlobalOptions } from '../settings.js';

interface FindOptions extends GlobalOptions {
  startsWith?: string;
  contains: string[];
  endsWith?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the find command.
 */
export function createFindCommand(): Command {
  return new Command('find')
    .description('Print the first template path matching the filters')
    .option('--starts-with <segment>', 'First segment of the path')
    .option('--contains <text>', 'Text some segment must contain (repeatable)', collect, [])
    .option('--ends-with <segment>', 'Last segment of the path')
    .action(async (_options: FindOptions, command: Command) => {
      try {
        await runFind(command.optsWithGlobals<FindOptions>());
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runFind(options: FindOptions): Promise<void> {
  const { settings } = await loadSettings(options);
  const registry = await TemplateRegistry.load(settings.templateFolder, { ignore: settings.ignore });
  const entries = flattenTemplate(registry.resolveTemplate(settings.template));

  const found = findPath(entries, {
    startsWith: options.startsWith,
    contains: options.contains,
    endsWith: options.endsWith,
  });

  if (!found) {
    log.error(`No path of ${settings.template} matches the filters`);
    process.exit(1);
  }

  console.log(found.join('/'));
}
