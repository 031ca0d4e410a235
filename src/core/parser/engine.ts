/**
 * Tree parser: extracts variable values from a path according to a template.
 *
 * Every template path is tried against the leading segments of the target;
 * a template path matches when each of its segments matches the target
 * segment at the same depth. Each match contributes the values it binds.
 * In strict mode only template paths covering the whole target count.
 */
import { StructureMismatchError } from '../../utils/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { compileSegment, matchSegment, type CompiledSegment } from '../template/grammar.js';
import { entryPath } from '../template/resolve.js';
import type { Bindings, ResolvedEntry, VariablePatterns } from '../template/types.js';

export interface ParseMatch {
  /** Template path that matched, placeholders included */
  templatePath: string;
  /** Number of target segments covered */
  depth: number;
  bindings: Bindings;
}

export interface ParseOptions {
  /** Require a template path matching every target segment */
  strict?: boolean;
}

export class TreeParser {
  private readonly compiled = new Map<string, CompiledSegment>();
  private log: Logger;

  constructor(
    private readonly patterns: VariablePatterns = {},
    log: Logger = rootLogger.child('parse')
  ) {
    this.log = log;
  }

  /**
   * Template paths matching `segments`, most bindings first, then deepest.
   * Throws StructureMismatchError when none does.
   */
  match(
    segments: string[],
    entries: ResolvedEntry[],
    templateName: string,
    options: ParseOptions = {}
  ): ParseMatch[] {
    const matches: ParseMatch[] = [];
    let deepest = 0;

    for (const entry of entries) {
      let bound: Bindings | null = {};
      let depth = 0;
      for (const segment of entry.segments) {
        if (depth >= segments.length) {
          bound = null;
          break;
        }
        bound = matchSegment(this.compile(segment), segments[depth], bound);
        if (!bound) break;
        depth++;
      }
      deepest = Math.max(deepest, depth);
      if (bound && (!options.strict || depth === segments.length)) {
        matches.push({ templatePath: entryPath(entry), depth, bindings: bound });
      }
    }

    if (matches.length === 0) {
      this.log.debug(`No template path of ${templateName} matches ${segments.join('/')}`);
      throw new StructureMismatchError(templateName, segments[deepest], deepest);
    }

    // Stable: template order is kept among equal matches
    return matches.sort(
      (a, b) =>
        Object.keys(b.bindings).length - Object.keys(a.bindings).length || b.depth - a.depth
    );
  }

  /**
   * Distinct non-empty binding sets of `segments`, in match order.
   */
  parseSegments(
    segments: string[],
    entries: ResolvedEntry[],
    templateName: string,
    options: ParseOptions = {}
  ): Bindings[] {
    const results: Bindings[] = [];
    const seen = new Set<string>();
    for (const { bindings } of this.match(segments, entries, templateName, options)) {
      const key = JSON.stringify(Object.entries(bindings).sort(([a], [b]) => a.localeCompare(b)));
      if (Object.keys(bindings).length === 0 || seen.has(key)) continue;
      seen.add(key);
      results.push(bindings);
    }
    return results;
  }

  private compile(segment: string): CompiledSegment {
    let compiled = this.compiled.get(segment);
    if (!compiled) {
      compiled = compileSegment(segment, this.patterns);
      this.compiled.set(segment, compiled);
    }
    return compiled;
  }
}
