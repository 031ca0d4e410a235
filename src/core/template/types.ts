/**
 * Template type definitions.
 */

/**
 * One entry of a template tree as read from the template folder.
 */
export interface TemplateNode {
  /** Entry name, with its `@` and `+` markers */
  name: string;
  folder: boolean;
  /** Permission bits (mode & 0o7777) */
  permission: number;
  /** Raw file bytes; only set for files */
  content?: Buffer;
  children: TemplateNode[];
}

/**
 * One path of a flattened template. Reference markers are removed,
 * placeholders are kept.
 */
export interface ResolvedEntry {
  segments: string[];
  folder: boolean;
  permission: number;
  /** Raw file bytes; empty for folders */
  content: Buffer;
}

/** Variable name to value. */
export type Bindings = Record<string, string>;

/** Variable name to value pattern (regular expression source). */
export type VariablePatterns = Record<string, string>;

export interface RegistryOptions {
  /** Gitignore-style patterns of entries to skip */
  ignore?: string[];
}
