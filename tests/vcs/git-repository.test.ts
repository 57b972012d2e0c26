/**
 * Git Backend Repository Tests
 * Runs the real git executable against throwaway repositories
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { execFileSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { GitVersionControl } from '../../src/vcs/git.js';
import { TransactionWrapper } from '../../src/transaction/wrapper.js';
import { defineMigration, revertFromHistory } from '../../src/migrations/unit.js';
import { createSilentLogger } from '../../src/cli/logger.js';
import { MigrationFailedError } from '../../src/engine/errors.js';
import type { MigrationContext } from '../../src/types/migration.js';

const AUTHOR = { name: 'Test User', email: 'test@example.com' };

function git(cwd: string, ...args: string[]): string {
  return execFileSync('git', args, { cwd, encoding: 'utf8', env: { ...process.env, GIT_TERMINAL_PROMPT: '0' } });
}

const hasGit = (() => {
  try {
    execFileSync('git', ['--version']);
    return true;
  } catch {
    return false;
  }
})();

describe.skipIf(!hasGit)('GitVersionControl in a package below the repository root', () => {
  let repo: string;
  let root: string;
  let vcs: GitVersionControl;
  let wrapper: TransactionWrapper;

  function write(relativePath: string, content: string): void {
    const file = path.join(repo, relativePath);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  function read(relativePath: string): string {
    return fs.readFileSync(path.join(repo, relativePath), 'utf8');
  }

  function context(appliedRef?: string): MigrationContext {
    return { workingRoot: root, runId: 'run-1', logger: createSilentLogger(), history: vcs, appliedRef };
  }

  beforeEach(() => {
    repo = fs.mkdtempSync(path.join(os.tmpdir(), 'git-repo-test-'));
    git(repo, 'init', '-q');
    git(repo, 'config', 'user.name', AUTHOR.name);
    git(repo, 'config', 'user.email', AUTHOR.email);
    git(repo, 'config', 'commit.gpgsign', 'false');

    write('pkg/a.txt', 'one\n');
    write('other.txt', 'outside\n');
    git(repo, 'add', '-A');
    git(repo, 'commit', '-q', '-m', 'initial');

    root = path.join(repo, 'pkg');
    vcs = new GitVersionControl({ cwd: root, exclude: ['.codemigrate'], author: AUTHOR });
    wrapper = new TransactionWrapper(vcs, { logger: createSilentLogger() });
  });

  afterEach(() => {
    fs.rmSync(repo, { recursive: true, force: true });
  });

  it('should only report changes inside the working root', async () => {
    write('pkg/a.txt', 'two\n');
    write('other.txt', 'changed\n');

    expect(await vcs.changedPaths()).toEqual(['a.txt']);
  });

  it('should apply and revert a migration relative to the working root', async () => {
    const unit = defineMigration({
      id: 'rewrite_a',
      apply: () => {
        write('pkg/a.txt', 'two\n');
      },
      revert: revertFromHistory,
    });

    const applied = await wrapper.runApply(unit, context());

    expect(applied.files).toEqual(['a.txt']);
    expect(await vcs.filesChangedIn(applied.ref)).toEqual(['a.txt']);
    expect((await vcs.readFileAt(applied.ref, 'a.txt'))?.toString()).toBe('two\n');
    expect(git(repo, 'log', '-1', '--format=%s').trim()).toBe('migrate: apply rewrite_a');

    await wrapper.runRevert(unit, context(applied.ref));

    expect(read('pkg/a.txt')).toBe('one\n');
    expect(read('other.txt')).toBe('outside\n');
    expect(await vcs.changedPaths()).toEqual([]);
  });

  it('should restore only the working root after a failure', async () => {
    write('other.txt', 'changed outside\n');
    const unit = defineMigration({
      id: 'broken',
      apply: () => {
        write('pkg/a.txt', 'half done\n');
        write('pkg/new.txt', 'new\n');
        throw new Error('rewrite failed');
      },
      revert: () => undefined,
    });

    await expect(wrapper.runApply(unit, context())).rejects.toThrow(MigrationFailedError);

    expect(read('pkg/a.txt')).toBe('one\n');
    expect(fs.existsSync(path.join(repo, 'pkg/new.txt'))).toBe(false);
    expect(read('other.txt')).toBe('changed outside\n');
  });
});
