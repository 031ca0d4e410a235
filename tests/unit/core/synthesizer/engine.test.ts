/**
 * Tests for the tree synthesizer.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { TreeSynthesizer } from '../../../../src/core/synthesizer/engine.js';
import { DEFAULT_PATTERNS } from '../../../../src/core/config/schema.js';
import { CreationError, InvalidValueError } from '../../../../src/utils/errors.js';
import type { ResolvedEntry } from '../../../../src/core/template/types.js';
import { makeTempDir } from '../../../helpers/fs-tree.js';

function folder(path: string, permission = 0o755): ResolvedEntry {
  return { segments: path.split('/'), folder: true, permission, content: Buffer.alloc(0) };
}

function file(path: string, content: string, permission = 0o644): ResolvedEntry {
  return { segments: path.split('/'), folder: false, permission, content: Buffer.from(content) };
}

const ENTRIES: ResolvedEntry[] = [
  folder('+show+'),
  folder('+show+/config'),
  file('+show+/config/settings.yaml', 'fps: 24\n'),
  folder('+show+/+sequence+'),
  folder('+show+/+sequence+/+shot+'),
];

describe('TreeSynthesizer', () => {
  let root: string;
  let synthesizer: TreeSynthesizer;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    root = await makeTempDir('create');
    synthesizer = new TreeSynthesizer();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  describe('plan', () => {
    it('should substitute values into every segment', () => {
      const { planned, skipped } = synthesizer.plan(ENTRIES, '/jobs', { show: 'white', sequence: 'AF', shot: 'AF001' });

      expect(planned.map((p) => p.relative)).toEqual([
        'white',
        'white/config',
        'white/config/settings.yaml',
        'white/AF',
        'white/AF/AF001',
      ]);
      expect(planned[4].path).toBe('/jobs/white/AF/AF001');
      expect(skipped).toEqual([]);
    });

    it('should skip entries with unbound variables and warn', () => {
      const { planned, skipped } = synthesizer.plan(ENTRIES, '/jobs', { show: 'white' });

      expect(planned.map((p) => p.relative)).toEqual(['white', 'white/config', 'white/config/settings.yaml']);
      expect(skipped).toEqual(['+show+/+sequence+', '+show+/+sequence+/+shot+']);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining('PATHSKIP: sequence not found for +show+/+sequence+')
      );
    });

    it('should keep a repeated path once', () => {
      const { planned } = synthesizer.plan([folder('+a+'), folder('+b+')], '/jobs', { a: 'x', b: 'x' });

      expect(planned.map((p) => p.relative)).toEqual(['x']);
    });

    it('should reject values outside their pattern', () => {
      expect(() =>
        synthesizer.plan([folder('+department+')], '/jobs', { department: 'Maya' }, DEFAULT_PATTERNS)
      ).toThrow(InvalidValueError);
    });
  });

  describe('synthesize', () => {
    it('should create folders and files', async () => {
      const result = await synthesizer.synthesize(ENTRIES, root, { show: 'white', sequence: 'AF', shot: 'AF001' });

      expect((await stat(join(root, 'white/AF/AF001'))).isDirectory()).toBe(true);
      expect(await readFile(join(root, 'white/config/settings.yaml'), 'utf-8')).toBe('fps: 24\n');
      expect(result.created).toHaveLength(5);
      expect(result.existing).toEqual([]);
    });

    it('should be idempotent on existing folders', async () => {
      const data = { show: 'white', sequence: 'AF', shot: 'AF001' };
      await synthesizer.synthesize(ENTRIES, root, data);

      const second = await synthesizer.synthesize(ENTRIES, root, data);

      expect(second.created).toEqual([]);
      expect(second.existing).toHaveLength(5);
    });

    it('should keep existing files unless asked to overwrite', async () => {
      await mkdir(join(root, 'white', 'config'), { recursive: true });
      await writeFile(join(root, 'white', 'config', 'settings.yaml'), 'fps: 25\n');

      await synthesizer.synthesize(ENTRIES, root, { show: 'white' });
      expect(await readFile(join(root, 'white/config/settings.yaml'), 'utf-8')).toBe('fps: 25\n');

      await synthesizer.synthesize(ENTRIES, root, { show: 'white' }, { overwrite: true });
      expect(await readFile(join(root, 'white/config/settings.yaml'), 'utf-8')).toBe('fps: 24\n');
    });

    it('should write binary content byte for byte', async () => {
      const bytes = Buffer.from([0x00, 0xff, 0xfe, 0x80, 0x41]);
      const entries: ResolvedEntry[] = [
        { segments: ['+show+.mb'], folder: false, permission: 0o644, content: bytes },
      ];

      await synthesizer.synthesize(entries, root, { show: 'white' });

      expect(await readFile(join(root, 'white.mb'))).toEqual(bytes);
    });

    it('should apply template permissions', async () => {
      const entries = [folder('+show+', 0o750), file('+show+/run.sh', 'echo\n', 0o700)];

      await synthesizer.synthesize(entries, root, { show: 'white' });

      expect((await stat(join(root, 'white'))).mode & 0o777).toBe(0o750);
      expect((await stat(join(root, 'white', 'run.sh'))).mode & 0o777).toBe(0o700);
    });

    it('should leave permissions alone when disabled', async () => {
      const entries = [file('+show+.txt', 'x', 0o604)];

      await synthesizer.synthesize(entries, root, { show: 'white' }, { applyPermissions: false });

      expect((await stat(join(root, 'white.txt'))).mode & 0o777).not.toBe(0o604);
    });

    it('should not touch the disk on a dry run', async () => {
      const result = await synthesizer.synthesize(ENTRIES, root, { show: 'white' }, { dryRun: true });

      expect(result.planned).toHaveLength(3);
      expect(result.created).toEqual([]);
      expect(existsSync(join(root, 'white'))).toBe(false);
    });

    it('should report the offending path on failure', async () => {
      await writeFile(join(root, 'white'), 'not a folder');

      const error = await synthesizer
        .synthesize([folder('+show+'), folder('+show+/config')], root, { show: 'white' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CreationError);
      expect(error).toMatchObject({ path: join(root, 'white') });
    });
  });
});
