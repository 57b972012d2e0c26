/**
 * Git Version-Control Backend
 *
 * Implements the VersionControl capability with the git executable:
 * - Async execFile invocation with timeout handling
 * - NUL-separated porcelain parsing
 * - State directory excluded from status and clean
 * - Working roots below the repository top level: paths are reported
 *   relative to the root and reset never touches files outside it
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { VersionControlError } from '../engine/errors.js';
import type { VersionControl } from './types.js';

const execFileAsync = promisify(execFile);

/**
 * Git backend configuration
 */
export interface GitOptions {
  /** Repository working tree */
  cwd: string;
  /** Paths (relative to cwd) never reported as changes nor cleaned */
  exclude?: string[];
  /** Command timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Committer identity, for repositories without one configured */
  author?: { name: string; email: string };
}

export const DEFAULT_GIT_TIMEOUT = 30000;

interface ExecFailure {
  code?: string | number;
  killed?: boolean;
  signal?: string | null;
  stderr?: string | Buffer;
  message?: string;
}

function asExecFailure(error: unknown): ExecFailure {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }

  const failure: ExecFailure = {};
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    failure.code = error.code;
  }
  if ('killed' in error && typeof error.killed === 'boolean') {
    failure.killed = error.killed;
  }
  if ('signal' in error && typeof error.signal === 'string') {
    failure.signal = error.signal;
  }
  if ('stderr' in error && (typeof error.stderr === 'string' || Buffer.isBuffer(error.stderr))) {
    failure.stderr = error.stderr;
  }
  if (error instanceof Error) {
    failure.message = error.message;
  }
  return failure;
}

/**
 * Split NUL-terminated git output into entries
 */
export function splitNul(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

/**
 * Parse `git status --porcelain=v1 -z` output into changed paths.
 * Renames and copies report both the new and the original path.
 */
export function parseStatusPorcelain(output: string): string[] {
  const entries = splitNul(output);
  const paths: string[] = [];

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const status = entry.slice(0, 2);
    paths.push(entry.slice(3));

    if (status.includes('R') || status.includes('C')) {
      const original = entries[i + 1];
      if (original !== undefined) {
        paths.push(original);
      }
      i++;
    }
  }

  return Array.from(new Set(paths));
}

/**
 * Map top-level paths to paths relative to `prefix`; paths outside it are dropped
 */
export function stripPrefix(paths: readonly string[], prefix: string): string[] {
  if (!prefix) {
    return [...paths];
  }
  return paths.filter((path) => path.startsWith(prefix)).map((path) => path.slice(prefix.length));
}

/**
 * Git-backed VersionControl
 */
export class GitVersionControl implements VersionControl {
  private readonly cwd: string;
  private readonly exclude: string[];
  private readonly timeout: number;
  private readonly author?: { name: string; email: string };
  /** Working root relative to the repository top level, '' or ending in '/' */
  private prefix?: string;

  constructor(options: GitOptions) {
    this.cwd = options.cwd;
    this.exclude = options.exclude ?? [];
    this.timeout = options.timeout ?? DEFAULT_GIT_TIMEOUT;
    this.author = options.author;
  }

  async changedPaths(): Promise<string[]> {
    const output = await this.run([
      'status',
      '--porcelain=v1',
      '-z',
      '--untracked-files=all',
      '--',
      ...this.scopePathspec(),
    ]);
    return stripPrefix(parseStatusPorcelain(output), await this.repositoryPrefix());
  }

  async head(): Promise<string> {
    return (await this.run(['rev-parse', 'HEAD'])).trim();
  }

  async commit(paths: readonly string[], message: string): Promise<string> {
    if (paths.length > 0) {
      await this.run(['--literal-pathspecs', 'add', '-A', '--', ...paths]);
    }

    const identity = this.author
      ? ['-c', `user.name=${this.author.name}`, '-c', `user.email=${this.author.email}`]
      : [];

    await this.run([...identity, 'commit', '--allow-empty', '--no-verify', '-m', message]);
    return this.head();
  }

  async reset(ref: string): Promise<void> {
    if (await this.repositoryPrefix()) {
      // Below the top level: move HEAD only, then restore just this subtree
      await this.run(['reset', '--soft', ref]);
      await this.run(['restore', `--source=${ref}`, '--staged', '--worktree', '--', ...this.scopePathspec()]);
    } else {
      await this.run(['reset', '--hard', ref]);
    }
    await this.run(['clean', '-fd', '--', ...this.scopePathspec()]);
  }

  async tag(name: string, ref: string): Promise<void> {
    await this.run(['tag', '-f', name, ref]);
  }

  async readFileAt(ref: string, path: string): Promise<Buffer | null> {
    const object = `${ref}:${await this.repositoryPrefix()}${path}`;

    try {
      await this.run(['cat-file', '-e', object]);
    } catch (error) {
      if (error instanceof VersionControlError) {
        return null;
      }
      throw error;
    }

    return this.runBuffer(['cat-file', 'blob', object]);
  }

  async filesChangedIn(ref: string): Promise<string[]> {
    const output = await this.run([
      'diff-tree',
      '--no-commit-id',
      '--name-only',
      '--root',
      '-r',
      '-z',
      ref,
    ]);
    return stripPrefix(splitNul(output), await this.repositoryPrefix());
  }

  async parentOf(ref: string): Promise<string | null> {
    const output = await this.run(['rev-list', '--parents', '-n', '1', ref]);
    const [, parent] = output.trim().split(/\s+/);
    return parent ?? null;
  }

  /**
   * Working root relative to the repository top level, resolved once
   */
  private async repositoryPrefix(): Promise<string> {
    if (this.prefix === undefined) {
      this.prefix = (await this.run(['rev-parse', '--show-prefix'])).trim();
    }
    return this.prefix;
  }

  /**
   * Pathspec covering the tree minus excluded paths
   */
  private scopePathspec(): string[] {
    return ['.', ...this.exclude.map((path) => `:(exclude)${path}`)];
  }

  private async run(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync('git', args, {
        cwd: this.cwd,
        timeout: this.timeout,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        maxBuffer: 64 * 1024 * 1024,
      });
      return stdout;
    } catch (error) {
      throw this.toVersionControlError(args, error);
    }
  }

  private async runBuffer(args: string[]): Promise<Buffer> {
    try {
      const { stdout } = await execFileAsync('git', args, {
        cwd: this.cwd,
        timeout: this.timeout,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        maxBuffer: 64 * 1024 * 1024,
        encoding: 'buffer',
      });
      return stdout;
    } catch (error) {
      throw this.toVersionControlError(args, error);
    }
  }

  private toVersionControlError(args: string[], error: unknown): VersionControlError {
    const failure = asExecFailure(error);
    const command = `git ${args.join(' ')}`;
    const stderr = failure.stderr === undefined ? undefined : failure.stderr.toString().trim();

    if (failure.code === 'ENOENT') {
      return new VersionControlError('git executable not found on PATH', command, stderr, {
        cause: error,
      });
    }

    if (failure.killed && failure.signal === 'SIGTERM') {
      return new VersionControlError(`git command timed out after ${this.timeout}ms`, command, stderr, {
        cause: error,
      });
    }

    return new VersionControlError(
      `git command failed: ${stderr || failure.message || 'unknown error'}`,
      command,
      stderr,
      { cause: error }
    );
  }
}
