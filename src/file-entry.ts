import fs from 'node:fs';
import path from 'node:path';

export const BROKEN_LINK_TARGET = 'broken symlink';

export interface FileEntry {
  name: string;
  relativePath: string;
  path: string;
  size: number;
  modTime: string;
  isDir: boolean;
  extension: string;
  isSymlink: boolean;
  linkTarget?: string;
}

function extensionOf(name: string): string {
  return path.extname(name).toLowerCase();
}

/**
 * Describes one node. The link itself is inspected first; a symlink then takes the
 * size, mtime and type of its target, or is reported as broken (size 0, not a
 * directory, no extension) when the target cannot be resolved.
 *
 * Rejects only when the node itself cannot be lstat'ed.
 */
export async function describeEntry(absolutePath: string, relativePath: string): Promise<FileEntry> {
  const name = path.basename(absolutePath);
  const linkStat = await fs.promises.lstat(absolutePath);
  const base = {
    name,
    relativePath,
    path: absolutePath
  };

  if (!linkStat.isSymbolicLink()) {
    const isDir = linkStat.isDirectory();
    return {
      ...base,
      size: linkStat.size,
      modTime: linkStat.mtime.toISOString(),
      isDir,
      extension: isDir ? '' : extensionOf(name),
      isSymlink: false
    };
  }

  const broken = (linkTarget: string): FileEntry => ({
    ...base,
    size: 0,
    modTime: linkStat.mtime.toISOString(),
    isDir: false,
    extension: '',
    isSymlink: true,
    linkTarget
  });

  let target: string;
  try {
    target = await fs.promises.readlink(absolutePath);
  } catch {
    return broken(BROKEN_LINK_TARGET);
  }

  let targetStat: fs.Stats;
  try {
    targetStat = await fs.promises.stat(absolutePath);
  } catch {
    return broken(`${target} (broken)`);
  }

  const isDir = targetStat.isDirectory();
  return {
    ...base,
    size: targetStat.size,
    modTime: targetStat.mtime.toISOString(),
    isDir,
    extension: isDir ? '' : extensionOf(name),
    isSymlink: true,
    linkTarget: target
  };
}
