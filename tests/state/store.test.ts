/**
 * State Store Test Suite
 * Tests the append-only history and the applied set derived from it
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConnectionManager, TEST_CONFIG } from '../../src/db/connection.js';
import { SqliteStateStore, replayApplied } from '../../src/state/store.js';
import { StateStoreError } from '../../src/engine/errors.js';

describe('replayApplied', () => {
  it('should track applies and reverts in row order', () => {
    expect(
      replayApplied([
        { migrationId: 'A', action: 'applied' },
        { migrationId: 'B', action: 'applied' },
        { migrationId: 'C', action: 'skipped' },
        { migrationId: 'A', action: 'reverted' },
        { migrationId: 'A', action: 'applied' },
      ])
    ).toEqual(['B', 'A']);
  });
});

describe('SqliteStateStore', () => {
  let connectionManager: ConnectionManager;
  let store: SqliteStateStore;

  beforeEach(() => {
    connectionManager = new ConnectionManager(TEST_CONFIG);
    connectionManager.connect();
    store = new SqliteStateStore(connectionManager);
  });

  afterEach(async () => {
    await store.close();
  });

  it('should start empty', async () => {
    expect(await store.appliedInOrder()).toEqual([]);
    expect(await store.history()).toEqual([]);
    expect(await store.lastRecord('A')).toBeNull();
  });

  it('should record an applied migration with its details', async () => {
    const record = await store.recordApplied('A', 'abc123', {
      runId: 'run-1',
      durationMs: 12.4,
      checksum: 'sum-a',
      metadata: { files: ['src/a.ts'] },
    });

    expect(record).toMatchObject({
      migrationId: 'A',
      action: 'applied',
      runId: 'run-1',
      vcsRef: 'abc123',
      durationMs: 12,
      checksum: 'sum-a',
      metadata: { files: ['src/a.ts'] },
    });
    expect(typeof record.id).toBe('number');
    expect(await store.isApplied('A')).toBe(true);
  });

  it('should generate a run id when none is given', async () => {
    const record = await store.recordApplied('A', 'abc123');
    expect(record.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should keep applied order and remove reverted migrations', async () => {
    await store.recordApplied('A', 'r1');
    await store.recordApplied('B', 'r2');
    await store.recordApplied('C', 'r3');
    await store.recordReverted('B', 'r4');

    expect(await store.appliedInOrder()).toEqual(['A', 'C']);
    expect(await store.isApplied('B')).toBe(false);
    expect(await store.pending(['A', 'B', 'C', 'D'])).toEqual(['B', 'D']);
  });

  it('should never delete history', async () => {
    await store.recordApplied('A', 'r1');
    await store.recordReverted('A', 'r2');
    await store.recordApplied('A', 'r3');

    const history = await store.history('A');
    expect(history.map((record) => [record.action, record.vcsRef])).toEqual([
      ['applied', 'r1'],
      ['reverted', 'r2'],
      ['applied', 'r3'],
    ]);
  });

  it('should record skips without counting them as applied', async () => {
    const record = await store.recordSkipped('A', { metadata: { reason: 'not-needed' } });

    expect(record.vcsRef).toBeNull();
    expect(record.action).toBe('skipped');
    expect(await store.isApplied('A')).toBe(false);
    expect((await store.lastRecord('A'))?.action).toBe('skipped');
  });

  it('should find the latest record of a given action', async () => {
    await store.recordApplied('A', 'r1');
    await store.recordReverted('A', 'r2');
    await store.recordApplied('A', 'r3');
    await store.recordReverted('A', 'r4');

    expect((await store.lastRecord('A', 'applied'))?.vcsRef).toBe('r3');
    expect((await store.lastRecord('A'))?.vcsRef).toBe('r4');
  });

  it('should refuse to apply twice', async () => {
    await store.recordApplied('A', 'r1');

    await expect(store.recordApplied('A', 'r2')).rejects.toThrow(StateStoreError);
    await expect(store.recordApplied('A', 'r2')).rejects.toThrow(
      'Migration A is already recorded as applied'
    );
    expect(await store.history('A')).toHaveLength(1);
  });

  it('should refuse to revert a migration that is not applied', async () => {
    await expect(store.recordReverted('A', 'r1')).rejects.toThrow(
      'Migration A is not recorded as applied'
    );
  });

  it('should persist across reopen', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'codemigrate-state-'));
    const filename = join(dir, '.codemigrate', 'state.db');

    try {
      const first = SqliteStateStore.open(filename);
      await first.recordApplied('A', 'r1');
      await first.recordApplied('B', 'r2');
      await first.close();

      const second = SqliteStateStore.open(filename);
      expect(await second.appliedInOrder()).toEqual(['A', 'B']);
      await second.close();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
