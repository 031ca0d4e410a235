/**
 * Error types and codes for ade.
 * Every error raised by the library extends AdeError.
 */

/**
 * Base error class for all ade errors.
 */
export class AdeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AdeError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export const ErrorCodes = {
  // Template errors
  TEMPLATE_NOT_FOUND: 'T001',
  TEMPLATE_FOLDER_UNREADABLE: 'T002',
  TEMPLATE_CYCLE: 'T003',

  // Path errors
  PATH_NOT_UNDER_MOUNT: 'P001',
  STRUCTURE_MISMATCH: 'P002',

  // Creation errors
  CREATION_FAILED: 'C001',
  INVALID_VALUE: 'C002',

  // Configuration
  CONFIG_LOAD_ERROR: 'CFG001',
  PARSE_ERROR: 'CFG002',
} as const;

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends AdeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

export class TemplateNotFoundError extends AdeError {
  constructor(public readonly templateName: string, available: string[] = []) {
    super(
      ErrorCodes.TEMPLATE_NOT_FOUND,
      `Template ${templateName} not found in register`,
      { template: templateName, available }
    );
    this.name = 'TemplateNotFoundError';
  }
}

export class TemplateFolderUnreadableError extends AdeError {
  constructor(public readonly folder: string, reason: string) {
    super(
      ErrorCodes.TEMPLATE_FOLDER_UNREADABLE,
      `Cannot read template folder ${folder}: ${reason}`,
      { folder, reason }
    );
    this.name = 'TemplateFolderUnreadableError';
  }
}

/**
 * Raised when template references form a loop (a template that includes itself).
 */
export class TemplateCycleError extends AdeError {
  constructor(public readonly chain: string[]) {
    super(
      ErrorCodes.TEMPLATE_CYCLE,
      `Template reference cycle: ${chain.join(' -> ')}`,
      { chain }
    );
    this.name = 'TemplateCycleError';
  }
}

export class PathNotUnderMountError extends AdeError {
  constructor(public readonly target: string, public readonly mountPoint: string) {
    super(
      ErrorCodes.PATH_NOT_UNDER_MOUNT,
      `Path ${target} is not under mount point ${mountPoint}`,
      { target, mountPoint }
    );
    this.name = 'PathNotUnderMountError';
  }
}

/**
 * Raised by parse mode when no template path matches the target.
 * `segment` is the first target segment no template path could match.
 */
export class StructureMismatchError extends AdeError {
  constructor(
    public readonly template: string,
    public readonly segment: string | undefined,
    public readonly index: number
  ) {
    super(
      ErrorCodes.STRUCTURE_MISMATCH,
      segment === undefined
        ? `Path does not match template ${template}: nothing to match below the mount point`
        : `Path does not match template ${template}: segment "${segment}" (position ${index}) diverges`,
      { template, segment, index }
    );
    this.name = 'StructureMismatchError';
  }
}

export class CreationError extends AdeError {
  constructor(public readonly path: string, reason: string) {
    super(ErrorCodes.CREATION_FAILED, `Failed to create ${path}: ${reason}`, { path, reason });
    this.name = 'CreationError';
  }
}

/**
 * A variable value that cannot be used as a path segment.
 */
export class InvalidValueError extends AdeError {
  constructor(public readonly variable: string, public readonly value: string) {
    super(
      ErrorCodes.INVALID_VALUE,
      `Invalid value for ${variable}: "${value}" is not a valid path segment`,
      { variable, value }
    );
    this.name = 'InvalidValueError';
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
