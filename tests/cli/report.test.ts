import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { ConcurrentRunDetectedError, ExitCode, MigrationFailedError } from '../../src/engine/errors.js';
import { formatFailure, formatProgress, formatRecords, reportFailure, shortRef } from '../../src/cli/report.js';
import { ValidationError } from '../../src/cli/options.js';
import { rollbackCommand } from '../../src/cli/commands/rollback.js';
import { createSilentLogger } from '../../src/cli/logger.js';
import type { ExecutionRecord } from '../../src/types/migration.js';

function record(migrationId: string, action: ExecutionRecord['action'], vcsRef: string | null): ExecutionRecord {
  return {
    id: 1,
    migrationId,
    action,
    runId: 'run-1',
    vcsRef,
    recordedAt: '2024-03-01T12:00:00.000Z',
    durationMs: 5,
    checksum: null,
    metadata: null,
  };
}

describe('Run report', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('shortens commit references', () => {
    expect(shortRef('0123456789abcdef0123')).toBe('0123456789ab');
    expect(shortRef(null)).toBe('-');
  });

  it('formats one line per record', () => {
    expect(formatRecords([record('A', 'applied', '0123456789abcdef'), record('B', 'skipped', null)])).toEqual([
      '  ✓ applied  A 0123456789ab',
      '  ○ skipped  B -',
    ]);
  });

  it('formats the progress of a halted run', () => {
    expect(
      formatProgress({
        completed: [record('A', 'applied', 'aaaaaaaaaaaaaaaa')],
        failed: 'B',
        pending: ['C'],
      })
    ).toEqual(['Completed (1):', '  ✓ applied  A aaaaaaaaaaaa', 'Failed: B', 'Pending (1):', '  • C']);
  });

  it('adds progress to failures that carry it', () => {
    const error = new MigrationFailedError('A', 'apply', new Error('boom'));
    error.progress = { completed: [], failed: 'A', pending: ['B', 'C'] };

    expect(formatFailure(error)).toEqual([
      'Error: Migration A failed during apply: boom',
      'Completed (0):',
      'Failed: A',
      'Pending (2):',
      '  • B',
      '  • C',
    ]);
    expect(formatFailure('plain')).toEqual(['Error: plain']);
  });

  it('adds the suggestion of an option error', () => {
    const error = new ValidationError('Cannot combine target "A" with --all', 'all', 'A', 'Pass either a target or --all');

    expect(formatFailure(error)).toEqual(['Error: Cannot combine target "A" with --all', '  Pass either a target or --all']);
  });

  it('maps failures to exit codes', () => {
    const printed = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createSilentLogger();

    expect(reportFailure(new ValidationError('bad option', 'all', true), logger)).toBe(ExitCode.ValidationFailure);
    expect(reportFailure(new ConcurrentRunDetectedError('42', 'now'), logger)).toBe(ExitCode.ConcurrencyConflict);
    expect(reportFailure(new Error('surprise'), logger)).toBe(ExitCode.Unexpected);
    expect(printed).toHaveBeenCalledWith('Error: bad option');
  });

  it('rejects a rollback target combined with --all before opening state', async () => {
    await expect(rollbackCommand('A', { all: true }, { cwd: '/nonexistent-root' })).rejects.toThrow(
      'Cannot combine target "A" with --all'
    );
  });
});
