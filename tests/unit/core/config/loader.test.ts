/**
 * Tests for the config loader.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadConfig, getDefaultConfig, mergeConfig, getConfigPath } from '../../../../src/core/config/loader.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `docmeta-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, '.docmeta'), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should fill every section with defaults', () => {
      expect(getDefaultConfig()).toEqual({
        scan: {
          include: ['src/**/*.ts'],
          exclude: ['**/node_modules/**', '**/dist/**', '**/*.d.ts', '**/*.test.ts', '**/*.spec.ts'],
        },
        expansion: { fail_fast: false },
        base_classes: { model: 'Model', controller: 'Controller' },
        hierarchy: {},
        output: { format: 'json' },
        log_level: 'info',
      });
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no config file exists', async () => {
      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should merge a partial file with defaults', async () => {
      await writeFile(
        join(testDir, '.docmeta', 'config.yaml'),
        [
          'base_classes:',
          '  model: Entity',
          'hierarchy:',
          '  BaseEntity: Entity',
          'output:',
          '  format: yaml',
        ].join('\n')
      );

      const config = await loadConfig(testDir);

      expect(config.base_classes).toEqual({ model: 'Entity', controller: 'Controller' });
      expect(config.hierarchy).toEqual({ BaseEntity: 'Entity' });
      expect(config.output.format).toBe('yaml');
      expect(config.scan.include).toEqual(['src/**/*.ts']);
    });

    it('should treat an empty file as defaults', async () => {
      await writeFile(join(testDir, '.docmeta', 'config.yaml'), '');

      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should load a custom path relative to the project root', async () => {
      await writeFile(join(testDir, 'docmeta.yaml'), 'expansion:\n  fail_fast: true\n');

      const config = await loadConfig(testDir, 'docmeta.yaml');

      expect(config.expansion.fail_fast).toBe(true);
    });

    it('should wrap invalid files in a ConfigError', async () => {
      await writeFile(join(testDir, '.docmeta', 'config.yaml'), 'output:\n  format: xml\n');

      await expect(loadConfig(testDir)).rejects.toBeInstanceOf(ConfigError);
      await expect(loadConfig(testDir)).rejects.toMatchObject({ code: ErrorCodes.CONFIG_LOAD_ERROR });
    });
  });

  describe('mergeConfig', () => {
    it('should apply defaults to a partial object', () => {
      const config = mergeConfig({ log_level: 'debug' });

      expect(config.log_level).toBe('debug');
      expect(config.expansion.fail_fast).toBe(false);
    });

    it('should treat null as empty', () => {
      expect(mergeConfig(null)).toEqual(getDefaultConfig());
    });

    it('should reject invalid values', () => {
      expect(() => mergeConfig({ log_level: 'loud' })).toThrow(ConfigError);
    });
  });

  describe('getConfigPath', () => {
    it('should point into the .docmeta directory', () => {
      expect(getConfigPath('/project')).toBe(join('/project', '.docmeta', 'config.yaml'));
    });
  });
});
