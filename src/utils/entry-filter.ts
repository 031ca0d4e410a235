/**
 * Gitignore-style filtering of template folder entries.
 */
import ignore, { type Ignore } from 'ignore';

/** Entries skipped when no patterns are configured. */
export const DEFAULT_IGNORE_PATTERNS = ['.git*'];

export interface EntryFilter {
  /**
   * Check if an entry should be skipped.
   * @param relativePath - Path relative to the template folder
   */
  ignores(relativePath: string): boolean;

  patterns(): string[];
}

export function createEntryFilter(patterns: string[] = DEFAULT_IGNORE_PATTERNS): EntryFilter {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(relativePath: string): boolean {
      return ig.ignores(relativePath.replace(/\\/g, '/'));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

/**
 * Parse ignore file content: one pattern per line, # comments.
 */
export function parseIgnorePatterns(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
