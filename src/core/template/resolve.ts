/**
 * Flatten a resolved template tree into its list of paths.
 */
import { stripReference } from './grammar.js';
import type { ResolvedEntry, TemplateNode } from './types.js';

/**
 * Every path of `template` in depth-first order, the root first.
 * Reference markers are removed from each segment.
 */
export function flattenTemplate(template: TemplateNode): ResolvedEntry[] {
  const entries: ResolvedEntry[] = [];
  visit(template, [], entries);
  return entries;
}

function visit(node: TemplateNode, parent: string[], entries: ResolvedEntry[]): void {
  const segments = [...parent, stripReference(node.name)];
  entries.push({
    segments,
    folder: node.folder,
    permission: node.permission,
    content: node.content ?? Buffer.alloc(0),
  });
  for (const child of node.children) {
    visit(child, segments, entries);
  }
}

export function entryPath(entry: ResolvedEntry): string {
  return entry.segments.join('/');
}
