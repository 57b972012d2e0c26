/**
 * Configuration Loader Tests
 *
 * Tests for configuration file loading, layering, and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import {
  deepMerge,
  loadConfig,
  loadConfigFile,
  loadEnvironmentConfig,
  resolvePaths,
} from '../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';

describe('Configuration Loader', () => {
  let testDir: string;
  let root: string;
  let home: string;

  function writeYaml(file: string, content: string): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf8');
  }

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
    root = path.join(testDir, 'project');
    home = path.join(testDir, 'home');
    fs.mkdirSync(root);
    fs.mkdirSync(home);
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('loadConfigFile', () => {
    it('should return null for a missing file', () => {
      expect(loadConfigFile(path.join(testDir, 'missing.yml'))).toBeNull();
    });

    it('should return null for an empty file', () => {
      const file = path.join(testDir, 'empty.yml');
      writeYaml(file, '');
      expect(loadConfigFile(file)).toBeNull();
    });

    it('should parse a partial configuration', () => {
      const file = path.join(testDir, 'config.yml');
      writeYaml(file, 'migrations:\n  directory: codemods\nvcs:\n  tagCommits: true\n');

      expect(loadConfigFile(file)).toEqual({
        migrations: { directory: 'codemods' },
        vcs: { tagCommits: true },
      });
    });

    it('should report YAML syntax errors with a line number', () => {
      const file = path.join(testDir, 'bad.yml');
      writeYaml(file, 'migrations:\n  directory: [unclosed\n');

      expect(() => loadConfigFile(file)).toThrow(`YAML parsing error in ${file}`);
    });

    it('should reject a non-object document', () => {
      const file = path.join(testDir, 'list.yml');
      writeYaml(file, '- a\n- b\n');

      expect(() => loadConfigFile(file)).toThrow(`Invalid configuration file: ${file} - expected object`);
    });

    it('should reject values of the wrong type', () => {
      const file = path.join(testDir, 'typed.yml');
      writeYaml(file, 'migrations:\n  strict: "yes"\n');

      expect(() => loadConfigFile(file)).toThrow(
        'Configuration validation failed:\n  • migrations.strict: Expected boolean, received string'
      );
    });
  });

  describe('loadEnvironmentConfig', () => {
    it('should return null without CODEMIGRATE_ variables', () => {
      expect(loadEnvironmentConfig({ PATH: '/usr/bin' })).toBeNull();
    });

    it('should map variables onto sections', () => {
      expect(
        loadEnvironmentConfig({
          CODEMIGRATE_MIGRATIONS_DIR: 'mig',
          CODEMIGRATE_STRICT: 'true',
          CODEMIGRATE_STALE_LOCK_MS: '60000',
          CODEMIGRATE_TAG_COMMITS: 'false',
          CODEMIGRATE_COMMIT_PREFIX: 'codemod',
          CODEMIGRATE_GIT_TIMEOUT_MS: '5000',
          CODEMIGRATE_LOG_LEVEL: 'debug',
          CODEMIGRATE_LOG_FILE: 'run.log',
        })
      ).toEqual({
        migrations: { directory: 'mig', strict: true },
        state: { staleLockMs: 60000 },
        vcs: { commitMessagePrefix: 'codemod', tagCommits: false, timeoutMs: 5000 },
        logging: { level: 'debug', filePath: 'run.log' },
      });
    });
  });

  describe('deepMerge', () => {
    it('should merge nested objects and replace arrays', () => {
      expect(deepMerge({ a: { x: 1, y: 2 }, list: [1, 2] }, { a: { y: 3 }, list: [9] })).toEqual({
        a: { x: 1, y: 3 },
        list: [9],
      });
    });

    it('should ignore undefined values', () => {
      expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when nothing is configured', () => {
      expect(loadConfig({ root, homeDir: home, env: {} })).toEqual(DEFAULT_CONFIG);
    });

    it('should layer global, project and environment settings', () => {
      writeYaml(
        path.join(home, '.codemigrate', 'config.yml'),
        'vcs:\n  commitMessagePrefix: global\n  tagCommits: true\nlogging:\n  level: warn\n'
      );
      writeYaml(path.join(root, '.codemigrate', 'config.yml'), 'vcs:\n  commitMessagePrefix: project\n');

      const config = loadConfig({ root, homeDir: home, env: { CODEMIGRATE_LOG_LEVEL: 'debug' } });

      expect(config.vcs).toEqual({ commitMessagePrefix: 'project', tagCommits: true, timeoutMs: 30000 });
      expect(config.logging.level).toBe('debug');
      expect(config.migrations).toEqual(DEFAULT_CONFIG.migrations);
    });

    it('should use an explicit config file instead of the project one', () => {
      writeYaml(path.join(root, '.codemigrate', 'config.yml'), 'migrations:\n  directory: ignored\n');
      writeYaml(path.join(root, 'ci.yml'), 'migrations:\n  directory: ci-migrations\n');

      const config = loadConfig({ root, homeDir: home, env: {}, configPath: 'ci.yml' });

      expect(config.migrations.directory).toBe('ci-migrations');
    });

    it('should fail when an explicit config file is missing', () => {
      expect(() => loadConfig({ root, homeDir: home, env: {}, configPath: 'nope.yml' })).toThrow(
        `Configuration file not found: ${path.join(root, 'nope.yml')}`
      );
    });

    it('should validate the merged configuration', () => {
      expect(() =>
        loadConfig({ root, homeDir: home, env: { CODEMIGRATE_GIT_TIMEOUT_MS: 'soon' } })
      ).toThrow('Configuration validation failed:\n  • vcs.timeoutMs: Expected number, received nan');
    });
  });

  describe('resolvePaths', () => {
    it('should resolve directories against the root', () => {
      expect(resolvePaths(DEFAULT_CONFIG, '/work')).toEqual({
        migrationsDir: '/work/migrations',
        stateDir: '/work/.codemigrate',
        stateDatabase: '/work/.codemigrate/state.db',
      });
    });
  });
});
