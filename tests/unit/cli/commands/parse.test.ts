/**
 * Tests for the parse command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { createParseCommand } from '../../../../src/cli/commands/parse.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { PathNotUnderMountError } from '../../../../src/utils/errors.js';
import type { RunSettings } from '../../../../src/core/runner/types.js';

const mocks = vi.hoisted(() => ({
  loadSettings: vi.fn(),
  parse: vi.fn(),
}));

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    cyan: (s: string) => s,
  },
}));

vi.mock('../../../../src/cli/settings.js', () => ({
  loadSettings: mocks.loadSettings,
}));

vi.mock('../../../../src/core/runner/runner.js', () => ({
  AdeRunner: vi.fn().mockImplementation(function () {
    return { parse: mocks.parse };
  }),
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
  },
}));

import { AdeRunner } from '../../../../src/core/runner/runner.js';
import { logger as log } from '../../../../src/utils/logger.js';

const SETTINGS: RunSettings = {
  templateFolder: '/templates',
  template: '@+show+@',
  mountPoint: '/jobs',
  patterns: {},
  ignore: ['.git*'],
  cwd: '/jobs',
};

describe('parse command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });

    mocks.loadSettings.mockResolvedValue({ settings: SETTINGS, config: getDefaultConfig() });
    mocks.parse.mockResolvedValue({
      status: 'success',
      result: {
        template: '@+show+@',
        mountPoint: '/jobs',
        target: '/jobs/white/AF',
        segments: ['white', 'AF'],
        matches: [{ show: 'white', sequence: 'AF' }],
      },
    });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  describe('createParseCommand', () => {
    it('should create a command with correct name', () => {
      expect(createParseCommand().name()).toBe('parse');
    });

    it('should have the parse options', () => {
      const optionNames = createParseCommand().options.map((opt) => opt.long);

      expect(optionNames).toEqual(['--path', '--strict', '--json']);
    });
  });

  describe('successful parse', () => {
    it('should run the parser on the given path', async () => {
      await createParseCommand().parseAsync(['node', 'test', '--path', '/jobs/white/AF', '--strict']);

      expect(AdeRunner).toHaveBeenCalledWith(SETTINGS);
      expect(mocks.parse).toHaveBeenCalledWith('/jobs/white/AF', { strict: true });
    });

    it('should parse the working directory without --path', async () => {
      await createParseCommand().parseAsync(['node', 'test']);

      expect(mocks.parse).toHaveBeenCalledWith(undefined, { strict: undefined });
    });

    it('should print the bound variables', async () => {
      await createParseCommand().parseAsync(['node', 'test']);

      const output = String(consoleLogSpy.mock.calls[0][0]);
      expect(output).toContain('  sequence  AF');
    });

    it('should print JSON with --json', async () => {
      await createParseCommand().parseAsync(['node', 'test', '--json']);

      const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output.matches).toEqual([{ show: 'white', sequence: 'AF' }]);
    });
  });

  describe('failed parse', () => {
    it('should log the error and exit 1', async () => {
      mocks.parse.mockResolvedValue({
        status: 'failed',
        error: new PathNotUnderMountError('/elsewhere', '/jobs'),
        stage: 'template_loaded',
      });

      await expect(createParseCommand().parseAsync(['node', 'test', '--path', '/elsewhere'])).rejects.toThrow(
        'process.exit called'
      );

      expect(log.error).toHaveBeenCalledWith('Path /elsewhere is not under mount point /jobs');
      expect(processExitSpy).toHaveBeenCalledWith(1);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });
});
