/**
 * ade - templated file system manager.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/schema.js';
export {
  loadConfig,
  getDefaultConfig,
  mergeConfig,
  effectivePatterns,
  getConfigPath,
  BUNDLED_TEMPLATE_FOLDER,
} from './core/config/loader.js';

// Templates
export * from './core/template/index.js';

// Mount point
export * from './core/mount/index.js';

// Create and parse
export * from './core/synthesizer/index.js';
export * from './core/parser/index.js';
export * from './core/runner/index.js';

// Utilities
export * from './utils/errors.js';
export { logger, Logger, verbosityToLevel, VERBOSITY_LEVELS } from './utils/logger.js';
export type { LogLevel, Verbosity } from './utils/logger.js';

// CLI
export { createCli } from './cli/index.js';
