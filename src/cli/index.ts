import { Command, Option } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { VERBOSITY_LEVELS } from '../utils/logger.js';
import { createParseCommand } from './commands/parse.js';
import { createCreateCommand } from './commands/create.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createFindCommand } from './commands/find.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('ade')
    .description('Templated file system manager')
    .version(VERSION)
    .option('--mount_point <path>', 'Mount point below which templates are created and parsed (default: system temp dir)')
    .option('--template <name>', 'Template to use (default: @+show+@)')
    .option('--template_folder <path>', 'Folder holding one directory per template')
    .addOption(new Option('--verbose <level>', 'Log verbosity').choices(VERBOSITY_LEVELS))
    .option('--config <path>', 'Configuration file (default: .ade/config.yaml)')
    .option('--log-file <path>', 'Also write log lines to this file');

  [createParseCommand, createCreateCommand, createListCommand, createShowCommand, createFindCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
