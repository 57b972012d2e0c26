import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  generateMigrationFile,
  generateMigrationFilename,
  renderMigrationTemplate,
} from '../../src/migrations/template.js';

const CREATED = new Date(2024, 2, 1, 12, 5, 9);

describe('Migration template', () => {
  describe('generateMigrationFilename', () => {
    it('prefixes a local timestamp and slugifies the name', () => {
      expect(generateMigrationFilename('Rename API client!', CREATED)).toBe(
        '20240301120509_rename_api_client.mjs'
      );
    });

    it('uses the requested extension', () => {
      expect(generateMigrationFilename('add_logging', CREATED, 'ts')).toBe('20240301120509_add_logging.ts');
    });

    it('rejects names without usable characters', () => {
      expect(() => generateMigrationFilename('***', CREATED)).toThrow(
        'Migration name "***" has no usable characters'
      );
    });
  });

  describe('renderMigrationTemplate', () => {
    it('fills in dependencies and escapes quotes', () => {
      const content = renderMigrationTemplate('20240301120509_x', "Drop Bob's helper", ['a', 'b'], 'mjs', CREATED);

      expect(content).toContain(" * Migration: 20240301120509_x\n");
      expect(content).toContain("export const description = 'Drop Bob\\'s helper';");
      expect(content).toContain("export const dependencies = ['a', 'b'];");
      expect(content).not.toContain('{{');
    });

    it('keeps replacement patterns in user text literal', () => {
      const content = renderMigrationTemplate("price_$&_$'", 'Cost in $& and $1', ["dep_$'"], 'mjs', CREATED);

      expect(content).toContain(" * Migration: price_$&_$'\n");
      expect(content).toContain("export const description = 'Cost in $& and $1';");
      expect(content).toContain("export const dependencies = ['dep_$\\''];");
    });

    it('renders typed hooks for the ts format', () => {
      const content = renderMigrationTemplate('x', 'X', [], 'ts', CREATED);

      expect(content).toContain("import type { MigrationContext, OperationReturn } from 'codemigrate';");
      expect(content).toContain('export const dependencies: string[] = [];');
    });
  });

  describe('generateMigrationFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'template-test-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes the module into a new directory', async () => {
      const migrationsDir = path.join(dir, 'migrations');
      const generated = await generateMigrationFile('add_logging', {
        migrationsDir,
        dependencies: ['20240101000000_base'],
        timestamp: CREATED,
      });

      expect(generated).toEqual({
        id: '20240301120509_add_logging',
        filepath: path.join(migrationsDir, '20240301120509_add_logging.mjs'),
      });

      const content = fs.readFileSync(generated.filepath, 'utf8');
      expect(content).toContain("export const description = 'Add Logging';");
      expect(content).toContain("export const dependencies = ['20240101000000_base'];");
    });

    it('refuses to overwrite an existing file', async () => {
      await generateMigrationFile('add_logging', { migrationsDir: dir, timestamp: CREATED });

      await expect(
        generateMigrationFile('add_logging', { migrationsDir: dir, timestamp: CREATED })
      ).rejects.toThrow(`Migration file already exists: ${path.join(dir, '20240301120509_add_logging.mjs')}`);
    });
  });
});
