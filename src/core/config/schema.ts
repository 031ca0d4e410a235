import { z } from 'zod';

/** Verbosity names as given on the command line. */
export const VerbositySchema = z.enum(['info', 'debug', 'warning', 'error']);

/** Template used when none is selected. */
export const DEFAULT_TEMPLATE = '@+show+@';

/**
 * Value patterns for variables, as regular expression source.
 * Variables without an entry accept letters, digits and underscores.
 */
export const DEFAULT_PATTERNS: Record<string, string> = {
  show: '[a-zA-Z0-9_]+',
  sequence: '[a-zA-Z0-9_]+',
  shot: '[a-zA-Z0-9_]+',
  department: '[a-z_]+',
};

export const DEFAULT_VARIABLE_PATTERN = '[a-zA-Z0-9_]+';

const PatternSchema = z.string().min(1).refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

/**
 * Project configuration (.ade/config.yaml).
 */
export const ConfigSchema = z.object({
  /** Mount point; the OS temporary directory when unset */
  mount_point: z.string().optional(),
  /** Folder holding one entry per template; the bundled templates when unset */
  template_folder: z.string().optional(),
  default_template: z.string().min(1).default(DEFAULT_TEMPLATE),
  verbose: VerbositySchema.default('info'),
  /** Gitignore-style patterns for template folder entries to skip */
  ignore: z.array(z.string()).default(['.git*']),
  /** Extra or overriding variable value patterns */
  patterns: z.record(z.string(), PatternSchema).default({}),
  /** Apply template permissions to created entries */
  apply_permissions: z.boolean().default(true),
});

export type Config = z.infer<typeof ConfigSchema>;
