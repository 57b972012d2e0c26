/**
 * In-process VersionControl over a real directory.
 *
 * Each commit stores a full snapshot of the tracked files so reset() can
 * restore the tree exactly. Top-level entries listed in `ignore` are never
 * tracked, reported or cleaned.
 */

import { mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import { dirname, join, relative, sep } from 'path';
import type { VersionControl } from '../../src/vcs/types.js';

interface Snapshot {
  ref: string;
  parent: string | null;
  message: string;
  files: Map<string, Buffer>;
  changed: string[];
}

export interface SnapshotVcsOptions {
  ignore?: string[];
}

export class SnapshotVcs implements VersionControl {
  readonly commits = new Map<string, Snapshot>();
  readonly tags = new Map<string, string>();
  private headRef = '';
  private readonly ignore: Set<string>;

  /** Fails the next reset() when set */
  failNextReset: Error | null = null;

  private constructor(
    private readonly root: string,
    options: SnapshotVcsOptions
  ) {
    this.ignore = new Set(options.ignore ?? ['.codemigrate']);
  }

  /**
   * Snapshot the current tree as the initial commit
   */
  static async init(root: string, options: SnapshotVcsOptions = {}): Promise<SnapshotVcs> {
    const vcs = new SnapshotVcs(root, options);
    const files = await vcs.scan();
    vcs.headRef = 'c0';
    vcs.commits.set('c0', { ref: 'c0', parent: null, message: 'initial', files, changed: [...files.keys()].sort() });
    return vcs;
  }

  async changedPaths(): Promise<string[]> {
    return diffSnapshots(this.current().files, await this.scan());
  }

  async head(): Promise<string> {
    return this.headRef;
  }

  async commit(paths: readonly string[], message: string): Promise<string> {
    const parent = this.current();
    const onDisk = await this.scan();
    const files = new Map(parent.files);

    for (const path of paths) {
      const content = onDisk.get(path);
      if (content === undefined) {
        files.delete(path);
      } else {
        files.set(path, content);
      }
    }

    const ref = `c${this.commits.size}`;
    this.commits.set(ref, { ref, parent: parent.ref, message, files, changed: diffSnapshots(parent.files, files) });
    this.headRef = ref;
    return ref;
  }

  async reset(ref: string): Promise<void> {
    if (this.failNextReset) {
      const error = this.failNextReset;
      this.failNextReset = null;
      throw error;
    }

    const target = this.snapshot(ref);
    const onDisk = await this.scan();

    for (const path of onDisk.keys()) {
      if (!target.files.has(path)) {
        await rm(join(this.root, path), { force: true });
      }
    }
    for (const [path, content] of target.files) {
      await mkdir(dirname(join(this.root, path)), { recursive: true });
      await writeFile(join(this.root, path), content);
    }

    this.headRef = ref;
  }

  async tag(name: string, ref: string): Promise<void> {
    this.tags.set(name, ref);
  }

  async readFileAt(ref: string, path: string): Promise<Buffer | null> {
    return this.snapshot(ref).files.get(path) ?? null;
  }

  async filesChangedIn(ref: string): Promise<string[]> {
    return [...this.snapshot(ref).changed];
  }

  async parentOf(ref: string): Promise<string | null> {
    return this.snapshot(ref).parent;
  }

  /**
   * Commit messages from HEAD back to the initial commit
   */
  log(): string[] {
    const messages: string[] = [];
    let ref: string | null = this.headRef;
    while (ref !== null) {
      const snapshot = this.snapshot(ref);
      messages.push(snapshot.message);
      ref = snapshot.parent;
    }
    return messages;
  }

  private current(): Snapshot {
    return this.snapshot(this.headRef);
  }

  private snapshot(ref: string): Snapshot {
    const snapshot = this.commits.get(ref);
    if (!snapshot) {
      throw new Error(`unknown revision ${ref}`);
    }
    return snapshot;
  }

  private async scan(dir = this.root): Promise<Map<string, Buffer>> {
    const files = new Map<string, Buffer>();
    const entries = await readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const full = join(dir, entry.name);
      const rel = relative(this.root, full).split(sep).join('/');
      if (dir === this.root && this.ignore.has(entry.name)) {
        continue;
      }
      if (entry.isDirectory()) {
        for (const [path, content] of await this.scan(full)) {
          files.set(path, content);
        }
      } else if (entry.isFile()) {
        files.set(rel, await readFile(full));
      }
    }

    return files;
  }
}

function diffSnapshots(before: Map<string, Buffer>, after: Map<string, Buffer>): string[] {
  const changed = new Set<string>();
  for (const [path, content] of after) {
    const previous = before.get(path);
    if (!previous || !previous.equals(content)) {
      changed.add(path);
    }
  }
  for (const path of before.keys()) {
    if (!after.has(path)) {
      changed.add(path);
    }
  }
  return [...changed].sort();
}
