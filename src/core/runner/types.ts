/**
 * Run pipeline type definitions.
 */
import type { Bindings, VariablePatterns } from '../template/types.js';
import type { SynthesisResult } from '../synthesizer/types.js';

/**
 * Stages of one invocation. `success` and `failed` are terminal.
 */
export type RunStage = 'unresolved' | 'template_loaded' | 'path_resolved' | 'success' | 'failed';

/**
 * Everything a run needs, after flags and configuration are merged.
 */
export interface RunSettings {
  templateFolder: string;
  template: string;
  mountPoint: string;
  patterns: VariablePatterns;
  ignore: string[];
  /** Base for relative paths */
  cwd: string;
}

export interface ParseOutcome {
  template: string;
  mountPoint: string;
  /** Absolute path that was parsed */
  target: string;
  /** Target segments below the mount point */
  segments: string[];
  /** Distinct binding sets, deepest match first */
  matches: Bindings[];
}

export interface CreateOutcome extends SynthesisResult {
  template: string;
  /** Folder the template was created in */
  root: string;
}

export interface CreateRequest {
  data: Bindings;
  overwrite?: boolean;
  applyPermissions?: boolean;
  dryRun?: boolean;
}

/**
 * Result of a run. On failure, `stage` is the last stage reached before the error.
 */
export type RunOutcome<T> =
  | { status: 'success'; result: T }
  | { status: 'failed'; error: Error; stage: RunStage };
