import path from 'node:path';
import { AccessDeniedError } from './errors.js';

/**
 * Client paths are always relative to the sandbox root, never to the host root:
 * leading separators are dropped before joining.
 */
function normalizeRelativeInput(rawPath: string | undefined): string {
  if (!rawPath) {
    return '';
  }
  return rawPath.replace(/^[/\\]+/, '');
}

export function isWithinBase(baseDir: string, absolutePath: string): boolean {
  const relative = path.relative(baseDir, absolutePath);
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

/**
 * Joins a client-supplied path onto the sandbox root. Throws instead of clamping
 * when the normalized result leaves the root.
 */
export function resolveSandboxPath(root: string, rawPath: string | undefined): string {
  const base = path.resolve(root);
  if (rawPath?.includes('\0')) {
    throw new AccessDeniedError();
  }
  const absolutePath = path.join(base, normalizeRelativeInput(rawPath));
  const normalized = absolutePath.length > 1 ? absolutePath.replace(/[/\\]+$/, '') : absolutePath;
  if (!isWithinBase(base, normalized)) {
    throw new AccessDeniedError();
  }
  return normalized;
}

export function toPortablePath(value: string): string {
  return value.split(path.sep).join('/');
}

/** Root maps to `''`. */
export function toSandboxRelative(root: string, absolutePath: string): string {
  return toPortablePath(path.relative(path.resolve(root), absolutePath));
}

export function isLeafName(name: string): boolean {
  return name.length > 0 && name !== '.' && name !== '..' && !/[/\\\0]/.test(name);
}
