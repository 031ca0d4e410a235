/**
 * Tree synthesizer type definitions.
 */
import type { VariablePatterns } from '../template/types.js';

export interface SynthesizeOptions {
  /** Variable value patterns; values must fully match them */
  patterns?: VariablePatterns;
  /** Replace files that already exist */
  overwrite?: boolean;
  /** Apply template permissions after creation (default true) */
  applyPermissions?: boolean;
  /** Report the plan without writing anything */
  dryRun?: boolean;
}

/**
 * One entry to create, with placeholders substituted.
 */
export interface PlannedEntry {
  /** Absolute path on disk */
  path: string;
  /** Path relative to the creation root */
  relative: string;
  folder: boolean;
  permission: number;
  content: Buffer;
}

export interface SynthesisResult {
  /** Entries in creation order */
  planned: PlannedEntry[];
  /** Absolute paths written by this run */
  created: string[];
  /** Absolute paths that were already present and left untouched */
  existing: string[];
  /** Template paths skipped for lack of variable values */
  skipped: string[];
}
