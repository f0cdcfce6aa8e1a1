import fs from 'fs/promises';
import path from 'path';
import { AccessDeniedError, BadRequestError, NotFoundError } from '../errors.js';
import { FileIndexManager } from '../file-index.js';
import { FileOperations } from '../file-ops.js';
import { makeTempDir, writeTree } from './helpers.js';

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}

describe('FileOperations', () => {
  let root: string;
  let index: FileIndexManager;
  let ops: FileOperations;

  beforeEach(async () => {
    root = await makeTempDir('ops');
    await writeTree(root, {
      'top.txt': 'top level',
      'a/b.txt': 'hello',
      'a/c/': ''
    });
    index = new FileIndexManager(root);
    await index.rebuild();
    ops = new FileOperations(index);
  });

  afterEach(async () => {
    await index.whenIdle();
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('browse', () => {
    it('lists the root with sorted entries', async () => {
      const result = await ops.browse('');

      expect(result.path).toBe('');
      expect(result.files.map((entry) => entry.name)).toEqual(['a', 'top.txt']);
      expect(result.files[0].isDir).toBe(true);
      expect(result.files[1].size).toBe(9);
    });

    it('lists a subdirectory with paths relative to the root', async () => {
      const result = await ops.browse('/a');

      expect(result.path).toBe('a');
      expect(result.files.map((entry) => entry.relativePath)).toEqual(['a/b.txt', 'a/c']);
    });

    it('fails for missing paths and files', async () => {
      await expect(ops.browse('missing')).rejects.toThrow(NotFoundError);
      await expect(ops.browse('top.txt')).rejects.toThrow('Path is not a directory');
    });

    it('refuses to leave the root', async () => {
      await expect(ops.browse('../')).rejects.toThrow(AccessDeniedError);
    });
  });

  describe('openDownload', () => {
    it('describes a regular file', async () => {
      const target = await ops.openDownload('a/b.txt');

      expect(target).toEqual({
        absolutePath: path.join(path.resolve(root), 'a', 'b.txt'),
        relativePath: 'a/b.txt',
        name: 'b.txt',
        size: 5
      });
    });

    it('refuses directories and missing files', async () => {
      await expect(ops.openDownload('a')).rejects.toThrow('Cannot download directory');
      await expect(ops.openDownload('a/none.txt')).rejects.toThrow('File not found');
    });
  });

  describe('uploads', () => {
    it('keeps only the leaf of a client file name', () => {
      expect(ops.uploadFileName('C:\\Users\\me\\report.pdf')).toBe('report.pdf');
      expect(ops.uploadFileName('photos/2024/cat.jpg')).toBe('cat.jpg');
      expect(ops.uploadFileName('plain.txt')).toBe('plain.txt');
    });

    it('rejects names without a usable leaf', () => {
      expect(() => ops.uploadFileName('..')).toThrow(BadRequestError);
      expect(() => ops.uploadFileName('dir/')).toThrow('Invalid file name');
    });

    it('creates missing target directories', async () => {
      const dir = await ops.prepareUploadDirectory('new/deeper');

      expect(dir).toBe(path.join(path.resolve(root), 'new', 'deeper'));
      expect(await exists(dir)).toBe(true);
    });

    it('reports the stored path and reindexes once complete', async () => {
      const dir = await ops.prepareUploadDirectory('a');
      await fs.writeFile(path.join(dir, 'up.bin'), 'data');

      expect(ops.completeUpload(path.join(dir, 'up.bin'))).toBe('a/up.bin');
      await index.whenIdle();
      expect(index.current().totalFiles).toBe(3);
    });
  });

  describe('rename', () => {
    it('renames within the same directory', async () => {
      const result = await ops.rename('a/b.txt', 'renamed.txt');

      expect(result).toEqual({ from: 'a/b.txt', to: 'a/renamed.txt' });
      expect(await exists(path.join(root, 'a', 'renamed.txt'))).toBe(true);
      expect(await exists(path.join(root, 'a', 'b.txt'))).toBe(false);
    });

    it('validates the new name', async () => {
      await expect(ops.rename('top.txt', undefined)).rejects.toThrow('newName is required');
      await expect(ops.rename('top.txt', '../escape.txt')).rejects.toThrow(
        'newName must be a single path component'
      );
      await expect(ops.rename('top.txt', '..')).rejects.toThrow(BadRequestError);
    });

    it('refuses to rename the root', async () => {
      await expect(ops.rename('', 'other')).rejects.toThrow('Cannot rename the root directory');
    });

    it('fails when the source is missing', async () => {
      await expect(ops.rename('ghost.txt', 'still-ghost.txt')).rejects.toThrow('Failed to rename file');
    });

    it('rejects a source outside the root before checking the name', async () => {
      await expect(ops.rename('../outside', undefined)).rejects.toThrow(AccessDeniedError);
    });
  });

  describe('remove', () => {
    it('deletes directories recursively', async () => {
      expect(await ops.remove('a')).toBe('a');
      expect(await exists(path.join(root, 'a'))).toBe(false);

      await index.whenIdle();
      expect(index.current().totalFiles).toBe(1);
    });

    it('treats a missing target as already removed', async () => {
      await expect(ops.remove('never-there')).resolves.toBe('never-there');
    });

    it('refuses to delete the root', async () => {
      await expect(ops.remove('/')).rejects.toThrow('Cannot delete the root directory');
      expect(await exists(root)).toBe(true);
    });
  });

  describe('mkdir', () => {
    it('creates a directory under the given parent', async () => {
      expect(await ops.mkdir('a', 'fresh')).toBe('a/fresh');
      expect(await exists(path.join(root, 'a', 'fresh'))).toBe(true);
    });

    it('succeeds when the directory already exists', async () => {
      await expect(ops.mkdir('a', 'c')).resolves.toBe('a/c');
    });

    it('requires a name and stays inside the root', async () => {
      await expect(ops.mkdir('', '')).rejects.toThrow('name is required');
      await expect(ops.mkdir('a', '../../escape')).rejects.toThrow(AccessDeniedError);
    });
  });
});
