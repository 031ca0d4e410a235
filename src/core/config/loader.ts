import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigSchema, DEFAULT_PATTERNS, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.ade/config.yaml';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Templates shipped with the package, found from src/ and dist/ alike.
 */
export const BUNDLED_TEMPLATE_FOLDER = path.resolve(__dirname, '../../../templates');

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicit
 * path that doesn't exist is an error. Relative folders in the file are
 * resolved against the file's directory.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  const config = await loadYamlWithSchema(fullPath, FileConfigSchema);
  const baseDir = path.dirname(fullPath);
  return {
    ...config,
    mount_point: config.mount_point && path.resolve(baseDir, config.mount_point),
    template_folder: config.template_folder && path.resolve(baseDir, config.template_folder),
  };
}

// An empty YAML document parses to null.
const FileConfigSchema = ConfigSchema.nullable().transform((value) => value ?? getDefaultConfig());

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Built-in variable patterns overlaid with the configured ones.
 */
export function effectivePatterns(config: Config): Record<string, string> {
  return { ...DEFAULT_PATTERNS, ...config.patterns };
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}
