import { ancestors, basename, canonical, dirname } from '../../utils/path.js';
import { toBytes } from '../../utils/encoding.js';
import type { NodeTree } from './NodeTree.js';
import type { INode } from './types.js';
import { VFSError, ErrorCode } from './types.js';

/** A declaration applied to a fresh filesystem before first use. */
export type SeedEntry =
  | { kind: 'file'; path: string; content: Uint8Array }
  | { kind: 'directory'; path: string };

export function withFile(path: string, content: string | Uint8Array = ''): SeedEntry {
  return { kind: 'file', path, content: toBytes(content) };
}

export function withDirectory(path: string): SeedEntry {
  return { kind: 'directory', path };
}

export interface Stamp {
  dirMode: number;
  fileMode: number;
  mtime: Date;
}

/**
 * Make sure every directory on the way to `dirPath` (inclusive) exists and
 * return the innermost one. Checks the whole chain before creating anything,
 * so a file in the way leaves the tree untouched.
 */
export function ensureDirectories(
  tree: NodeTree,
  rawPath: string,
  mode: number,
  mtime: Date,
  op: string,
  reportPath: string = rawPath,
): INode {
  const dirPath = canonical(rawPath);
  const chain = dirPath === '/' ? [] : [...ancestors(dirPath), dirPath];

  for (const p of chain) {
    const existing = tree.lookup(p);
    if (existing && existing.kind !== 'directory') {
      throw new VFSError(ErrorCode.ENOTDIR, op, reportPath);
    }
  }

  let current = tree.root();
  for (const p of chain) {
    current = tree.lookup(p) ?? tree.insert(current, 'directory', basename(p), mode, mtime);
  }
  return current;
}

export function applySeed(tree: NodeTree, entry: SeedEntry, stamp: Stamp): INode {
  if (entry.kind === 'directory') {
    return ensureDirectories(tree, entry.path, stamp.dirMode, stamp.mtime, 'mkdir');
  }

  const path = canonical(entry.path);
  if (path === '/') {
    throw new VFSError(ErrorCode.EISDIR, 'open', entry.path);
  }
  const parent = ensureDirectories(tree, dirname(path), stamp.dirMode, stamp.mtime, 'open', entry.path);
  const existing = tree.lookup(path);
  if (existing) {
    if (existing.kind === 'directory') {
      throw new VFSError(ErrorCode.EISDIR, 'open', entry.path);
    }
    existing.data = new Uint8Array(entry.content);
    existing.mtime = stamp.mtime;
    return existing;
  }
  return tree.insert(parent, 'file', basename(path), stamp.fileMode, stamp.mtime, new Uint8Array(entry.content));
}
