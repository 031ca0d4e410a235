/**
 * Template exports barrel file.
 */
export { TemplateRegistry, IGNORE_FILENAME, compareNodes } from './registry.js';
export { flattenTemplate, entryPath } from './resolve.js';
export { findPath, sanitizeFilter } from './find-path.js';
export type { FindPathFilters } from './find-path.js';
export {
  compileSegment,
  isReference,
  matchSegment,
  patternFor,
  renderSegment,
  segmentVariables,
  sortKey,
  stripReference,
  tokenizeSegment,
} from './grammar.js';
export type { CompiledSegment, RenderResult, SegmentToken } from './grammar.js';
export type {
  Bindings,
  RegistryOptions,
  ResolvedEntry,
  TemplateNode,
  VariablePatterns,
} from './types.js';
