/**
 * POSIX path operations -- pure string manipulation, no I/O.
 */

export function normalize(path: string): string {
  if (path === '') return '.';

  const absolute = path.startsWith('/');
  const parts = path.split('/');
  const resolved: string[] = [];

  for (const part of parts) {
    if (part === '' || part === '.') continue;
    if (part === '..') {
      if (resolved.length > 0 && resolved[resolved.length - 1] !== '..') {
        resolved.pop();
      } else if (!absolute) {
        resolved.push('..');
      }
    } else {
      resolved.push(part);
    }
  }

  let result = resolved.join('/');
  if (absolute) result = '/' + result;
  return result || (absolute ? '/' : '.');
}

export function isAbsolute(path: string): boolean {
  return path.startsWith('/');
}

export function join(...segments: string[]): string {
  return normalize(segments.filter(Boolean).join('/'));
}

export function resolve(cwd: string, ...segments: string[]): string {
  let result = cwd;
  for (const seg of segments) {
    if (isAbsolute(seg)) {
      result = seg;
    } else {
      result = result + '/' + seg;
    }
  }
  return normalize(result);
}

/** Canonical absolute form of `path`; relative paths are taken from the root. */
export function canonical(path: string): string {
  return resolve('/', path);
}

export function dirname(path: string): string {
  const normalized = normalize(path);
  const lastSlash = normalized.lastIndexOf('/');
  if (lastSlash === -1) return '.';
  if (lastSlash === 0) return '/';
  return normalized.slice(0, lastSlash);
}

export function basename(path: string): string {
  const normalized = normalize(path);
  const lastSlash = normalized.lastIndexOf('/');
  return lastSlash === -1 ? normalized : normalized.slice(lastSlash + 1);
}

/** True when a path other than the root is written with a trailing `/`. */
export function hasTrailingSeparator(path: string): boolean {
  return path.length > 1 && path.endsWith('/') && normalize(path) !== '/';
}

/**
 * Every ancestor of a canonical path, outermost first, excluding the root
 * and the path itself: "/a/b/c" -> ["/a", "/a/b"].
 */
export function ancestors(path: string): string[] {
  const parts = path.split('/').filter(Boolean);
  const result: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    result.push('/' + parts.slice(0, i).join('/'));
  }
  return result;
}
