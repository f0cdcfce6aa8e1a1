import fs from 'node:fs';
import path from 'node:path';
import {
  AccessDeniedError,
  BadRequestError,
  InternalError,
  NotFoundError
} from './errors.js';
import { describeEntry, type FileEntry } from './file-entry.js';
import type { FileIndexManager } from './file-index.js';
import { isLeafName, resolveSandboxPath, toSandboxRelative } from './sandbox.js';

export interface BrowseResult {
  path: string;
  files: FileEntry[];
}

export interface DownloadTarget {
  absolutePath: string;
  relativePath: string;
  name: string;
  size: number;
}

export interface RenameResult {
  from: string;
  to: string;
}

export function isMissing(error: unknown): boolean {
  const code = error && typeof error === 'object' ? (error as NodeJS.ErrnoException).code : undefined;
  return code === 'ENOENT' || code === 'ENOTDIR';
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * Every filesystem effect on the served tree goes through here. Paths are resolved by
 * the sandbox before any syscall, and each mutation schedules a background reindex;
 * callers get their result before that reindex finishes.
 */
export class FileOperations {
  private readonly root: string;
  private readonly index: FileIndexManager;

  constructor(index: FileIndexManager) {
    this.index = index;
    this.root = index.getRoot();
  }

  getRoot(): string {
    return this.root;
  }

  resolve(requestPath: string | undefined): string {
    return resolveSandboxPath(this.root, requestPath);
  }

  relative(absolutePath: string): string {
    return toSandboxRelative(this.root, absolutePath);
  }

  async browse(requestPath: string | undefined): Promise<BrowseResult> {
    const targetPath = this.resolve(requestPath);

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(targetPath);
    } catch {
      throw new NotFoundError('Path not found');
    }
    if (!stat.isDirectory()) {
      throw new BadRequestError('Path is not a directory');
    }

    let names: string[];
    try {
      names = await fs.promises.readdir(targetPath);
    } catch (error) {
      throw new InternalError('Failed to read directory', error);
    }
    names.sort(compareNames);

    const relativeDir = this.relative(targetPath);
    const described = await Promise.all(
      names.map(async (name) => {
        const relativePath = relativeDir ? `${relativeDir}/${name}` : name;
        try {
          return await describeEntry(path.join(targetPath, name), relativePath);
        } catch {
          // vanished between readdir and lstat
          return null;
        }
      })
    );

    return {
      path: relativeDir,
      files: described.filter((entry): entry is FileEntry => entry !== null)
    };
  }

  async openDownload(requestPath: string | undefined): Promise<DownloadTarget> {
    const targetPath = this.resolve(requestPath);

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(targetPath);
    } catch {
      throw new NotFoundError('File not found');
    }
    if (stat.isDirectory()) {
      throw new BadRequestError('Cannot download directory');
    }

    return {
      absolutePath: targetPath,
      relativePath: this.relative(targetPath),
      name: path.basename(targetPath),
      size: stat.size
    };
  }

  /** Creates (recursively) and returns the directory an upload lands in. */
  async prepareUploadDirectory(requestPath: string | undefined): Promise<string> {
    const targetDir = this.resolve(requestPath);
    try {
      await fs.promises.mkdir(targetDir, { recursive: true });
    } catch (error) {
      throw new InternalError('Failed to create directory', error);
    }
    return targetDir;
  }

  /**
   * Reduces a client-supplied filename to its leaf. Browsers may send a full path
   * for the file part.
   */
  uploadFileName(originalName: string): string {
    const leaf = originalName.split(/[/\\]/).pop() ?? '';
    if (!isLeafName(leaf)) {
      throw new BadRequestError('Invalid file name');
    }
    return leaf;
  }

  /** Called once the uploaded content is on disk. */
  completeUpload(absolutePath: string): string {
    this.index.scheduleRebuild('upload');
    return this.relative(absolutePath);
  }

  async rename(requestPath: string | undefined, newName: unknown): Promise<RenameResult> {
    const sourcePath = this.resolve(requestPath);
    if (typeof newName !== 'string' || newName.length === 0) {
      throw new BadRequestError('newName is required');
    }
    if (!isLeafName(newName)) {
      throw new BadRequestError('newName must be a single path component');
    }
    if (sourcePath === this.root) {
      throw new BadRequestError('Cannot rename the root directory');
    }

    const targetPath = resolveSandboxPath(this.root, path.join(this.relative(path.dirname(sourcePath)), newName));
    try {
      await fs.promises.rename(sourcePath, targetPath);
    } catch (error) {
      throw new InternalError('Failed to rename file', error);
    }

    this.index.scheduleRebuild('rename');
    return {
      from: this.relative(sourcePath),
      to: this.relative(targetPath)
    };
  }

  /** Missing targets are not an error. */
  async remove(requestPath: string | undefined): Promise<string> {
    const targetPath = this.resolve(requestPath);
    if (targetPath === this.root) {
      throw new AccessDeniedError('Cannot delete the root directory');
    }

    try {
      await fs.promises.rm(targetPath, { recursive: true, force: true });
    } catch (error) {
      if (!isMissing(error)) {
        throw new InternalError('Failed to delete file', error);
      }
    }

    this.index.scheduleRebuild('delete');
    return this.relative(targetPath);
  }

  async mkdir(requestPath: string | undefined, name: unknown): Promise<string> {
    if (typeof name !== 'string' || name.length === 0) {
      throw new BadRequestError('name is required');
    }
    const parent = (requestPath ?? '').replace(/^[/\\]+/, '');
    const targetPath = resolveSandboxPath(this.root, path.join(parent, name));

    try {
      await fs.promises.mkdir(targetPath, { recursive: true });
    } catch (error) {
      throw new InternalError('Failed to create directory', error);
    }

    this.index.scheduleRebuild('mkdir');
    return this.relative(targetPath);
  }
}
