/**
 * Tests for template path lookup and flattening.
 */
import { describe, it, expect } from 'vitest';
import { findPath, sanitizeFilter } from '../../../../src/core/template/find-path.js';
import { flattenTemplate } from '../../../../src/core/template/resolve.js';
import type { TemplateNode } from '../../../../src/core/template/types.js';

function folder(name: string, children: TemplateNode[] = []): TemplateNode {
  return { name, folder: true, permission: 0o755, children };
}

const template = folder('@+show+@', [
  folder('config'),
  folder('@+sequence+@', [
    folder('+shot+', [folder('+department+', [folder('publish'), folder('scenes')])]),
  ]),
]);

const entries = flattenTemplate(template);

describe('flattenTemplate', () => {
  it('should list the root first and strip reference markers', () => {
    expect(entries[0]).toEqual({ segments: ['+show+'], folder: true, permission: 0o755, content: Buffer.alloc(0) });
    expect(entries[2].segments).toEqual(['+show+', '+sequence+']);
  });

  it('should visit depth first', () => {
    expect(entries.map((e) => e.segments.length)).toEqual([1, 2, 2, 3, 4, 5, 5]);
  });
});

describe('sanitizeFilter', () => {
  it('should remove plus markers and braces', () => {
    expect(sanitizeFilter('+shot+')).toBe('shot');
    expect(sanitizeFilter('{shot}')).toBe('shot');
    expect(sanitizeFilter('scenes')).toBe('scenes');
  });
});

describe('findPath', () => {
  it('should return the first path when no filter is given', () => {
    expect(findPath(entries, {})).toEqual(['+show+']);
  });

  it('should match the last segment', () => {
    expect(findPath(entries, { endsWith: 'scenes' })).toEqual([
      '+show+', '+sequence+', '+shot+', '+department+', 'scenes',
    ]);
  });

  it('should accept placeholder spellings', () => {
    expect(findPath(entries, { startsWith: '{show}', endsWith: '+shot+' })).toEqual([
      '+show+', '+sequence+', '+shot+',
    ]);
  });

  it('should require every contains item', () => {
    expect(findPath(entries, { contains: ['department', 'publish'] })).toEqual([
      '+show+', '+sequence+', '+shot+', '+department+', 'publish',
    ]);
  });

  it('should return undefined when nothing matches', () => {
    expect(findPath(entries, { startsWith: 'episode' })).toBeUndefined();
  });
});
