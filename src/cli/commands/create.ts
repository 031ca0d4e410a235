/**
 * Create a template's directory tree at the mount point.
 */
import { Command, InvalidArgumentError } from 'commander';
import { AdeRunner } from '../../core/runner/runner.js';
import type { Bindings } from '../../core/template/types.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import { loadSettings, type GlobalOptions } from '../settings.js';

interface CreateOptions extends GlobalOptions {
  set: Bindings;
  dryRun?: boolean;
  overwrite?: boolean;
  permissions: boolean;
  json?: boolean;
}

/**
 * Collect repeated `--set key=value` flags.
 */
export function collectAssignment(assignment: string, previous: Bindings): Bindings {
  const separator = assignment.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${assignment}"`);
  }
  const key = assignment.slice(0, separator).trim();
  const value = assignment.slice(separator + 1).trim();
  return { ...previous, [key]: value };
}

/**
 * Create the create command.
 */
export function createCreateCommand(): Command {
  return new Command('create')
    .description('Create the directory tree of a template at the mount point')
    .option('-s, --set <key=value>', 'Value for a template variable (repeatable)', collectAssignment, {})
    .option('--dry-run', 'Show what would be created without writing')
    .option('--overwrite', 'Replace files that already exist')
    .option('--no-permissions', 'Do not apply template permissions')
    .option('--json', 'Output as JSON')
    .action(async (_options: CreateOptions, command: Command) => {
      try {
        await runCreate(command.optsWithGlobals<CreateOptions>());
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runCreate(options: CreateOptions): Promise<void> {
  const { settings, config } = await loadSettings(options);
  const outcome = await new AdeRunner(settings).create({
    data: options.set,
    dryRun: options.dryRun,
    overwrite: options.overwrite,
    applyPermissions: options.permissions && config.apply_permissions,
  });

  if (outcome.status === 'failed') {
    throw outcome.error;
  }

  console.log(createFormatter(options.json).formatCreate(outcome.result, options.dryRun ?? false));
  if (!options.dryRun && !options.json) {
    log.success(`Created ${outcome.result.template} in ${outcome.result.root}`);
  }
}
