/**
 * Template registry.
 *
 * Each directory directly inside the template folder is a template, named
 * after the directory. Loading reads every template tree into memory,
 * file contents included, so later operations never touch the folder again.
 */
import * as path from 'node:path';
import { fileExists, getPermission, isDirectory, listDir, readBytes, readFile, realPath } from '../../utils/file-system.js';
import { createEntryFilter, parseIgnorePatterns, DEFAULT_IGNORE_PATTERNS, type EntryFilter } from '../../utils/entry-filter.js';
import {
  AdeError,
  TemplateCycleError,
  TemplateFolderUnreadableError,
  TemplateNotFoundError,
  errorMessage,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isReference, sortKey } from './grammar.js';
import type { RegistryOptions, TemplateNode } from './types.js';

/** Extra ignore patterns may be listed in this file inside the template folder. */
export const IGNORE_FILENAME = '.adeignore';

const log = logger.child('registry');

/**
 * Folders first, then by name without markers.
 */
export function compareNodes(a: TemplateNode, b: TemplateNode): number {
  if (a.folder !== b.folder) return a.folder ? -1 : 1;
  const byKey = sortKey(a.name).localeCompare(sortKey(b.name));
  return byKey !== 0 ? byKey : a.name.localeCompare(b.name);
}

function sortTree(node: TemplateNode): void {
  node.children.sort(compareNodes);
  node.children.forEach(sortTree);
}

export class TemplateRegistry {
  private constructor(
    readonly folder: string,
    private readonly templates: Map<string, TemplateNode>
  ) {}

  /**
   * Read every template in `folder`.
   */
  static async load(folder: string, options: RegistryOptions = {}): Promise<TemplateRegistry> {
    let root: string;
    let entries: string[];
    try {
      root = await realPath(path.resolve(folder));
      entries = await listDir(root);
    } catch (error) {
      throw new TemplateFolderUnreadableError(path.resolve(folder), errorMessage(error));
    }
    log.debug(`Using template path: ${root}`);

    const filter = await loadFilter(root, options.ignore ?? DEFAULT_IGNORE_PATTERNS);
    const templates: TemplateNode[] = [];
    for (const entry of entries) {
      const entryPath = path.join(root, entry);
      if (entry === IGNORE_FILENAME || filter.ignores(entry) || !(await isDirectory(entryPath))) {
        continue;
      }
      const node = await readTemplate(entryPath, entry, filter);
      sortTree(node);
      templates.push(node);
      log.debug(`Registered template ${entry}`);
    }
    templates.sort(compareNodes);

    return new TemplateRegistry(root, new Map(templates.map((node) => [node.name, node])));
  }

  /** Registered template names, sorted. */
  names(): string[] {
    return [...this.templates.keys()];
  }

  /**
   * A copy of the named template, references left unexpanded.
   */
  get(name: string): TemplateNode {
    const node = this.templates.get(name);
    if (!node) {
      log.error(`template ${name} not found in register`);
      throw new TemplateNotFoundError(name, this.names());
    }
    return cloneNode(node);
  }

  /**
   * A copy of the named template with every reference replaced by the
   * template it names. Children of a reference entry are added to the
   * children of the template it expands to.
   */
  resolveTemplate(name: string): TemplateNode {
    const root = this.get(name);
    this.expand(root, [name]);
    sortTree(root);
    return root;
  }

  private expand(node: TemplateNode, chain: string[]): void {
    node.children = node.children.map((child) => {
      if (!isReference(child.name)) {
        this.expand(child, chain);
        return child;
      }
      if (chain.includes(child.name)) {
        throw new TemplateCycleError([...chain, child.name]);
      }
      const fragment = this.get(child.name);
      fragment.children.push(...child.children);
      this.expand(fragment, [...chain, child.name]);
      return fragment;
    });
  }
}

async function loadFilter(root: string, patterns: string[]): Promise<EntryFilter> {
  const ignoreFile = path.join(root, IGNORE_FILENAME);
  if (!(await fileExists(ignoreFile))) {
    return createEntryFilter(patterns);
  }
  try {
    return createEntryFilter([...patterns, ...parseIgnorePatterns(await readFile(ignoreFile))]);
  } catch (error) {
    throw new TemplateFolderUnreadableError(ignoreFile, errorMessage(error));
  }
}

/**
 * Read one template. Any failure below it is reported against the template.
 */
async function readTemplate(absolutePath: string, name: string, filter: EntryFilter): Promise<TemplateNode> {
  try {
    return await readNode(absolutePath, name, filter, new Set());
  } catch (error) {
    if (error instanceof AdeError) throw error;
    throw new TemplateFolderUnreadableError(absolutePath, errorMessage(error));
  }
}

/**
 * `ancestors` holds the real paths of the folders above, so a symlink
 * pointing back up the tree is reported instead of followed forever.
 */
async function readNode(
  absolutePath: string,
  relativePath: string,
  filter: EntryFilter,
  ancestors: Set<string>
): Promise<TemplateNode> {
  const name = path.basename(absolutePath);
  const permission = await getPermission(absolutePath);

  if (!(await isDirectory(absolutePath))) {
    return { name, folder: false, permission, content: await readBytes(absolutePath), children: [] };
  }

  const real = await realPath(absolutePath);
  if (ancestors.has(real)) {
    throw new TemplateFolderUnreadableError(absolutePath, `link loop back to ${real}`);
  }
  const below = new Set(ancestors).add(real);

  const children: TemplateNode[] = [];
  for (const entry of await listDir(absolutePath)) {
    const childRelative = `${relativePath}/${entry}`;
    if (filter.ignores(childRelative)) continue;
    children.push(await readNode(path.join(absolutePath, entry), childRelative, filter, below));
  }
  return { name, folder: true, permission, children };
}

function cloneNode(node: TemplateNode): TemplateNode {
  return {
    ...node,
    content: node.content && Buffer.from(node.content),
    children: node.children.map(cloneNode),
  };
}
