/**
 * Global CLI options and how they combine with the configuration file.
 * A flag wins over the file; the file wins over built-in defaults.
 */
import * as path from 'node:path';
import { loadConfig, effectivePatterns, BUNDLED_TEMPLATE_FOLDER } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { resolveMountPoint } from '../core/mount/resolver.js';
import type { RunSettings } from '../core/runner/types.js';
import { logger, verbosityToLevel, type Verbosity } from '../utils/logger.js';

export interface GlobalOptions {
  mount_point?: string;
  template?: string;
  template_folder?: string;
  verbose?: Verbosity;
  config?: string;
  logFile?: string;
}

export interface LoadedSettings {
  settings: RunSettings;
  config: Config;
}

export async function loadSettings(
  options: GlobalOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedSettings> {
  const config = await loadConfig(cwd, options.config);
  configureLogging(options, config, cwd, env);

  const settings: RunSettings = {
    templateFolder: path.resolve(cwd, options.template_folder ?? config.template_folder ?? BUNDLED_TEMPLATE_FOLDER),
    template: options.template ?? config.default_template,
    mountPoint: resolveMountPoint(options.mount_point ?? config.mount_point, cwd),
    patterns: effectivePatterns(config),
    ignore: config.ignore,
    cwd,
  };
  logger.debug('Resolved settings', { ...settings });
  return { settings, config };
}

/**
 * ADE_DEBUG set to anything but "0" forces debug output.
 */
export function configureLogging(
  options: GlobalOptions,
  config: Config,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): void {
  const forceDebug = env.ADE_DEBUG !== undefined && env.ADE_DEBUG !== '0';
  logger.setLevel(forceDebug ? 'debug' : verbosityToLevel(options.verbose ?? config.verbose));
  if (options.logFile) {
    logger.setLogFile(path.resolve(cwd, options.logFile));
  }
}
