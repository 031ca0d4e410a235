/**
 * Tree synthesizer: materialises a flattened template on disk.
 */
import * as path from 'node:path';
import { ensureDir, fileExists, setPermission, writeFile } from '../../utils/file-system.js';
import { CreationError, errorMessage } from '../../utils/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { renderSegment } from '../template/grammar.js';
import { entryPath } from '../template/resolve.js';
import type { Bindings, ResolvedEntry, VariablePatterns } from '../template/types.js';
import type { PlannedEntry, SynthesisResult, SynthesizeOptions } from './types.js';

export interface SynthesisPlan {
  planned: PlannedEntry[];
  skipped: string[];
}

export class TreeSynthesizer {
  private log: Logger;

  constructor(log: Logger = rootLogger.child('create')) {
    this.log = log;
  }

  /**
   * Substitute `data` into every entry below `root`.
   * Entries with unbound variables are skipped; a repeated path is kept once.
   */
  plan(
    entries: ResolvedEntry[],
    root: string,
    data: Bindings,
    patterns: VariablePatterns = {}
  ): SynthesisPlan {
    const planned: PlannedEntry[] = [];
    const skipped: string[] = [];
    const seen = new Set<string>();

    for (const entry of entries) {
      const rendered: string[] = [];
      let missing: string[] = [];
      for (const segment of entry.segments) {
        const result = renderSegment(segment, data, patterns);
        if (!result.ok) {
          missing = result.missing;
          break;
        }
        rendered.push(result.value);
      }

      if (missing.length > 0) {
        this.log.warn(`PATHSKIP: ${missing.join(', ')} not found for ${entryPath(entry)}`);
        skipped.push(entryPath(entry));
        continue;
      }

      const relative = rendered.join('/');
      if (seen.has(relative)) continue;
      seen.add(relative);

      planned.push({
        path: path.join(root, ...rendered),
        relative,
        folder: entry.folder,
        permission: entry.permission,
        content: entry.content,
      });
    }

    return { planned, skipped };
  }

  async synthesize(
    entries: ResolvedEntry[],
    root: string,
    data: Bindings,
    options: SynthesizeOptions = {}
  ): Promise<SynthesisResult> {
    const { planned, skipped } = this.plan(entries, root, data, options.patterns);
    const result: SynthesisResult = { planned, created: [], existing: [], skipped };

    if (options.dryRun) {
      return result;
    }

    for (const entry of planned) {
      const written = entry.folder
        ? await this.createFolder(entry.path)
        : await this.createFile(entry, options.overwrite ?? false);
      (written ? result.created : result.existing).push(entry.path);
    }

    if (options.applyPermissions ?? true) {
      // Deepest first, so a read-only folder does not block its children
      for (const entry of [...planned].reverse()) {
        this.log.debug(`setting ${entry.permission.toString(8)} for ${entry.path}`);
        try {
          await setPermission(entry.path, entry.permission);
        } catch (error) {
          throw new CreationError(entry.path, errorMessage(error));
        }
      }
    }

    return result;
  }

  private async createFolder(folder: string): Promise<boolean> {
    this.log.debug(`creating folder: ${folder}`);
    try {
      return await ensureDir(folder);
    } catch (error) {
      throw new CreationError(folder, errorMessage(error));
    }
  }

  private async createFile(entry: PlannedEntry, overwrite: boolean): Promise<boolean> {
    try {
      if (!overwrite && (await fileExists(entry.path))) {
        this.log.debug(`keeping existing file: ${entry.path}`);
        return false;
      }
      this.log.debug(`creating file: ${entry.path}`);
      await writeFile(entry.path, entry.content);
      return true;
    } catch (error) {
      throw new CreationError(entry.path, errorMessage(error));
    }
  }
}
