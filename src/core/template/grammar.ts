/**
 * Entry name grammar.
 *
 * An entry name is a sequence of literal text and `+variable+` placeholders.
 * A name containing `@` refers to another registered template.
 *
 *   `@+show+@`     reference to the template named `@+show+@`
 *   `+shot+_v+n+`  placeholders `shot` and `n` around a literal `_v`
 *   `scenes`       literal
 */
import { DEFAULT_VARIABLE_PATTERN } from '../config/schema.js';
import { InvalidValueError } from '../../utils/errors.js';
import type { Bindings, VariablePatterns } from './types.js';

export const REFERENCE_MARKER = '@';
export const VARIABLE_MARKER = '+';

export type SegmentToken =
  | { kind: 'literal'; text: string }
  | { kind: 'variable'; name: string };

const PLACEHOLDER_RE = /\+([A-Za-z0-9_]+)\+/g;

export function isReference(name: string): boolean {
  return name.includes(REFERENCE_MARKER);
}

/**
 * Drop reference markers, keeping placeholders.
 */
export function stripReference(name: string): string {
  return name.split(REFERENCE_MARKER).join('');
}

/**
 * Drop every marker; used as the ordering key of entries.
 */
export function sortKey(name: string): string {
  return stripReference(name).split(VARIABLE_MARKER).join('').toLowerCase();
}

export function tokenizeSegment(segment: string): SegmentToken[] {
  const tokens: SegmentToken[] = [];
  let last = 0;
  for (const match of segment.matchAll(PLACEHOLDER_RE)) {
    const index = match.index ?? 0;
    if (index > last) {
      tokens.push({ kind: 'literal', text: segment.slice(last, index) });
    }
    tokens.push({ kind: 'variable', name: match[1] });
    last = index + match[0].length;
  }
  if (last < segment.length) {
    tokens.push({ kind: 'literal', text: segment.slice(last) });
  }
  return tokens;
}

/**
 * Variable names used in a segment, in order of first appearance.
 */
export function segmentVariables(segment: string): string[] {
  const names: string[] = [];
  for (const token of tokenizeSegment(segment)) {
    if (token.kind === 'variable' && !names.includes(token.name)) {
      names.push(token.name);
    }
  }
  return names;
}

export function patternFor(name: string, patterns: VariablePatterns): string {
  return Object.hasOwn(patterns, name) ? patterns[name] : DEFAULT_VARIABLE_PATTERN;
}

export type RenderResult =
  | { ok: true; value: string }
  | { ok: false; missing: string[] };

/**
 * Substitute placeholders with values from `data`.
 * Values must be usable as a single path segment and fully match their
 * variable's pattern.
 */
export function renderSegment(
  segment: string,
  data: Bindings,
  patterns: VariablePatterns = {}
): RenderResult {
  const tokens = tokenizeSegment(segment);
  const missing = tokens
    .filter((token): token is { kind: 'variable'; name: string } => token.kind === 'variable')
    .map((token) => token.name)
    .filter((name, index, names) => !Object.hasOwn(data, name) && names.indexOf(name) === index);
  if (missing.length > 0) {
    return { ok: false, missing };
  }

  const parts = tokens.map((token) => {
    if (token.kind === 'literal') return token.text;
    const value = data[token.name];
    assertValidValue(token.name, value, patterns);
    return value;
  });
  return { ok: true, value: parts.join('') };
}

function assertValidValue(name: string, value: string, patterns: VariablePatterns): void {
  if (
    value === '' ||
    value === '.' ||
    value === '..' ||
    /[/\\\0]/.test(value) ||
    !new RegExp(`^(?:${patternFor(name, patterns)})$`).test(value)
  ) {
    throw new InvalidValueError(name, value);
  }
}

/**
 * A segment compiled into an anchored regular expression.
 */
export interface CompiledSegment {
  source: string;
  regex: RegExp;
  /** Variable bound by each capture group, in group order */
  groups: string[];
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compileSegment(segment: string, patterns: VariablePatterns = {}): CompiledSegment {
  const groups: string[] = [];
  const body = tokenizeSegment(segment)
    .map((token) => {
      if (token.kind === 'literal') return escapeRegex(token.text);
      const group = `ade${groups.length}`;
      groups.push(token.name);
      return `(?<${group}>${patternFor(token.name, patterns)})`;
    })
    .join('');
  return { source: segment, regex: new RegExp(`^${body}$`), groups };
}

/**
 * Match one on-disk name against a compiled segment, extending `bound`.
 * Returns null when the name does not match or a variable would be bound
 * to two different values.
 */
export function matchSegment(compiled: CompiledSegment, value: string, bound: Bindings = {}): Bindings | null {
  const match = compiled.regex.exec(value);
  if (!match) return null;

  const result: Bindings = { ...bound };
  for (const [index, name] of compiled.groups.entries()) {
    const captured = match.groups?.[`ade${index}`];
    if (captured === undefined) return null;
    if (Object.hasOwn(result, name)) {
      if (result[name] !== captured) return null;
      continue;
    }
    // defineProperty: a variable named __proto__ must stay an own key
    Object.defineProperty(result, name, { value: captured, enumerable: true, writable: true, configurable: true });
  }
  return result;
}
