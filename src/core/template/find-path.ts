/**
 * Look up a template path by its first, last and inner segments.
 */
import { logger } from '../../utils/logger.js';
import type { ResolvedEntry } from './types.js';

export interface FindPathFilters {
  /** First segment, with or without `+` markers */
  startsWith?: string;
  /** Strings that must each occur inside some segment */
  contains?: string[];
  /** Last segment, with or without `+` markers */
  endsWith?: string;
}

const log = logger.child('find');

/**
 * Remove `+` markers and surrounding braces: `+shot+` and `{shot}` become `shot`.
 */
export function sanitizeFilter(value: string): string {
  const bare = value.split('+').join('');
  return bare.startsWith('{') && bare.endsWith('}') ? bare.slice(1, -1) : bare;
}

/**
 * First template path satisfying every given filter.
 */
export function findPath(entries: ResolvedEntry[], filters: FindPathFilters): string[] | undefined {
  const startsWith = filters.startsWith ? sanitizeFilter(filters.startsWith) : undefined;
  const endsWith = filters.endsWith ? sanitizeFilter(filters.endsWith) : undefined;
  const contains = (filters.contains ?? []).map(sanitizeFilter);

  log.debug('Filtering template paths', { startsWith, contains, endsWith });

  for (const { segments } of entries) {
    const first = sanitizeFilter(segments[0]);
    const last = sanitizeFilter(segments[segments.length - 1]);

    if (startsWith !== undefined && first !== startsWith) continue;
    if (endsWith !== undefined && last !== endsWith) continue;
    if (!contains.every((item) => segments.some((segment) => segment.includes(item)))) continue;

    return segments;
  }

  log.debug('No template path matches the filters');
  return undefined;
}
