import fs from 'node:fs';
import path from 'node:path';
import { BadRequestError, errorMessage } from './errors.js';
import { describeEntry, type FileEntry } from './file-entry.js';

const SEARCH_LIMIT_DEFAULT = 100;
const SEARCH_LIMIT_MAX = 500;

export interface FileIndexSnapshot {
  readonly files: readonly FileEntry[];
  readonly directories: readonly FileEntry[];
  readonly lastIndexed: string;
  readonly totalFiles: number;
  readonly totalSize: number;
}

export interface FileIndexHooks {
  onBuilt?: (snapshot: FileIndexSnapshot, durationMs: number) => void;
  onFailed?: (reason: string, error: unknown) => void;
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

async function walk(
  absoluteDir: string,
  relativeDir: string,
  files: FileEntry[],
  directories: FileEntry[]
): Promise<void> {
  let names: string[];
  try {
    names = await fs.promises.readdir(absoluteDir);
  } catch {
    return;
  }
  names.sort(compareNames);

  for (const name of names) {
    const absolutePath = path.join(absoluteDir, name);
    const relativePath = relativeDir ? `${relativeDir}/${name}` : name;
    let entry: FileEntry;
    try {
      entry = await describeEntry(absolutePath, relativePath);
    } catch {
      continue;
    }

    if (!entry.isDir) {
      files.push(entry);
      continue;
    }
    directories.push(entry);
    // symlinked directories are listed but not followed
    if (!entry.isSymlink) {
      await walk(absolutePath, relativePath, files, directories);
    }
  }
}

function freezeEntries(entries: FileEntry[]): readonly FileEntry[] {
  for (const entry of entries) {
    Object.freeze(entry);
  }
  return Object.freeze(entries);
}

/**
 * Walks the whole tree under `root` (the root itself is not recorded). Unreadable
 * entries are skipped, so this never rejects for per-entry errors.
 */
export async function buildFileIndex(root: string): Promise<FileIndexSnapshot> {
  const lastIndexed = new Date().toISOString();
  const files: FileEntry[] = [];
  const directories: FileEntry[] = [];
  await walk(path.resolve(root), '', files, directories);

  const totalSize = files.reduce((sum, entry) => sum + entry.size, 0);
  return Object.freeze({
    files: freezeEntries(files),
    directories: freezeEntries(directories),
    lastIndexed,
    totalFiles: files.length,
    totalSize
  });
}

export function emptyFileIndex(): FileIndexSnapshot {
  return Object.freeze({
    files: Object.freeze([]),
    directories: Object.freeze([]),
    lastIndexed: new Date(0).toISOString(),
    totalFiles: 0,
    totalSize: 0
  });
}

/**
 * Holds the published snapshot. Builds happen off to the side and are published by
 * a single assignment, so readers only ever see a complete snapshot. When builds
 * overlap, a build is dropped if one that started after it has already been
 * published.
 */
export class FileIndexManager {
  private readonly root: string;
  private readonly hooks: FileIndexHooks;
  private snapshot: FileIndexSnapshot = emptyFileIndex();
  private nextSeq = 0;
  private publishedSeq = -1;
  private readonly pending = new Set<Promise<void>>();
  private readonly build: (root: string) => Promise<FileIndexSnapshot>;

  constructor(
    root: string,
    hooks: FileIndexHooks = {},
    build: (root: string) => Promise<FileIndexSnapshot> = buildFileIndex
  ) {
    this.root = path.resolve(root);
    this.hooks = hooks;
    this.build = build;
  }

  getRoot(): string {
    return this.root;
  }

  current(): FileIndexSnapshot {
    return this.snapshot;
  }

  async rebuild(): Promise<FileIndexSnapshot> {
    const seq = this.nextSeq;
    this.nextSeq += 1;
    const startedAt = Date.now();
    const built = await this.build(this.root);
    // a build that started later may already be published
    if (seq > this.publishedSeq) {
      this.publishedSeq = seq;
      this.snapshot = built;
      this.hooks.onBuilt?.(built, Date.now() - startedAt);
    }
    return this.snapshot;
  }

  /** Fire-and-forget: the caller does not wait, and failures are only logged. */
  scheduleRebuild(reason: string): void {
    const task = this.rebuild()
      .then(() => undefined)
      .catch((error: unknown) => {
        console.warn(`[treeserve] index: background rebuild after ${reason} failed (${errorMessage(error)})`);
        this.hooks.onFailed?.(reason, error);
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  search(query: string, limit = SEARCH_LIMIT_DEFAULT): FileEntry[] {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      throw new BadRequestError('Search query is required');
    }
    const max = Number.isFinite(limit) ? Math.max(1, Math.min(SEARCH_LIMIT_MAX, Math.trunc(limit))) : SEARCH_LIMIT_DEFAULT;
    const snapshot = this.snapshot;
    const results: FileEntry[] = [];
    for (const entry of [...snapshot.directories, ...snapshot.files]) {
      if (results.length >= max) {
        break;
      }
      if (entry.name.toLowerCase().includes(needle)) {
        results.push(entry);
      }
    }
    return results;
  }
}
