import { Command } from 'commander';
import chalk from 'chalk';
import { TemplateRegistry } from '../../core/template/registry.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { loadSettings, type GlobalOptions } from '../settings.js';

interface ListOptions extends GlobalOptions {
  json?: boolean;
}

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  return new Command('list')
    .description('List the templates in the template folder')
    .option('--json', 'Output as JSON')
    .action(async (_options: ListOptions, command: Command) => {
      try {
        await runList(command.optsWithGlobals<ListOptions>());
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runList(options: ListOptions): Promise<void> {
  const { settings } = await loadSettings(options);
  const registry = await TemplateRegistry.load(settings.templateFolder, { ignore: settings.ignore });
  const names = registry.names();

  if (options.json) {
    console.log(JSON.stringify({ folder: registry.folder, templates: names }, null, 2));
    return;
  }

  console.log(chalk.dim(registry.folder));
  for (const name of names) {
    const marker = name === settings.template ? chalk.green(' (default)') : '';
    console.log(`  ${chalk.cyan(name)}${marker}`);
  }
}
