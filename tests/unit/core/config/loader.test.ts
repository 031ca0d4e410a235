import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import {
  loadConfig,
  getDefaultConfig,
  mergeConfig,
  effectivePatterns,
  getConfigPath,
} from '../../../../src/core/config/loader.js';
import { ConfigError } from '../../../../src/utils/errors.js';
import { makeTempDir } from '../../../helpers/fs-tree.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir('config');
    await mkdir(join(testDir, '.ade'), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should have sensible defaults', () => {
      const config = getDefaultConfig();

      expect(config.default_template).toBe('@+show+@');
      expect(config.verbose).toBe('info');
      expect(config.ignore).toEqual(['.git*']);
      expect(config.patterns).toEqual({});
      expect(config.apply_permissions).toBe(true);
      expect(config.mount_point).toBeUndefined();
    });
  });

  describe('loadConfig', () => {
    it('should return default config when no config file exists', async () => {
      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should load config from the default location', async () => {
      await writeFile(
        join(testDir, '.ade', 'config.yaml'),
        'default_template: base\nverbose: debug\npatterns:\n  asset: "[a-z]+"\n'
      );

      const config = await loadConfig(testDir);

      expect(config.default_template).toBe('base');
      expect(config.verbose).toBe('debug');
      expect(config.patterns).toEqual({ asset: '[a-z]+' });
    });

    it('should resolve folders relative to the config file', async () => {
      await writeFile(join(testDir, '.ade', 'config.yaml'), 'mount_point: ../jobs\ntemplate_folder: templates\n');

      const config = await loadConfig(testDir);

      expect(config.mount_point).toBe(join(testDir, 'jobs'));
      expect(config.template_folder).toBe(join(testDir, '.ade', 'templates'));
    });

    it('should treat an empty file as defaults', async () => {
      await writeFile(join(testDir, '.ade', 'config.yaml'), '');

      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should load an explicit config path', async () => {
      await writeFile(join(testDir, 'custom.yaml'), 'apply_permissions: false\n');

      const config = await loadConfig(testDir, 'custom.yaml');

      expect(config.apply_permissions).toBe(false);
    });

    it('should fail when an explicit config path is missing', async () => {
      await expect(loadConfig(testDir, 'missing.yaml')).rejects.toThrow(ConfigError);
    });

    it('should reject invalid verbosity', async () => {
      await writeFile(join(testDir, '.ade', 'config.yaml'), 'verbose: loud\n');

      await expect(loadConfig(testDir)).rejects.toThrow(/YAML validation failed: verbose/);
    });

    it('should reject invalid patterns', async () => {
      await writeFile(join(testDir, '.ade', 'config.yaml'), 'patterns:\n  asset: "[a-z"\n');

      await expect(loadConfig(testDir)).rejects.toThrow(/patterns\.asset: Invalid regular expression/);
    });

    it('should report malformed YAML', async () => {
      await writeFile(join(testDir, '.ade', 'config.yaml'), 'verbose: [info\n');

      await expect(loadConfig(testDir)).rejects.toThrow(/Failed to parse YAML/);
    });
  });

  describe('effectivePatterns', () => {
    it('should overlay configured patterns on the built-in ones', () => {
      const patterns = effectivePatterns(mergeConfig({ patterns: { department: '[a-z]+', asset: '\\w+' } }));

      expect(patterns).toEqual({
        show: '[a-zA-Z0-9_]+',
        sequence: '[a-zA-Z0-9_]+',
        shot: '[a-zA-Z0-9_]+',
        department: '[a-z]+',
        asset: '\\w+',
      });
    });
  });

  describe('getConfigPath', () => {
    it('should point into .ade', () => {
      expect(getConfigPath('/project')).toBe('/project/.ade/config.yaml');
    });
  });
});
