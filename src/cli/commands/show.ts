import { Command } from 'commander';
import chalk from 'chalk';
import { TemplateRegistry } from '../../core/template/registry.js';
import { entryPath, flattenTemplate } from '../../core/template/resolve.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { loadSettings, type GlobalOptions } from '../settings.js';

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  return new Command('show')
    .description('Print every path of the selected template, references expanded')
    .action(async (_options: GlobalOptions, command: Command) => {
      try {
        await runShow(command.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runShow(options: GlobalOptions): Promise<void> {
  const { settings } = await loadSettings(options);
  const registry = await TemplateRegistry.load(settings.templateFolder, { ignore: settings.ignore });
  const entries = flattenTemplate(registry.resolveTemplate(settings.template));

  console.log(chalk.bold(settings.template));
  for (const entry of entries) {
    const mode = chalk.dim(entry.permission.toString(8).padStart(4, '0'));
    console.log(`  ${mode}  ${entryPath(entry)}${entry.folder ? '/' : ''}`);
  }
}
