import { ancestors, basename, canonical, dirname, hasTrailingSeparator } from '../../utils/path.js';
import type { NodeTree } from './NodeTree.js';
import type { INode } from './types.js';
import { VFSError, ErrorCode } from './types.js';

export type Resolution =
  | { kind: 'found'; path: string; node: INode }
  | { kind: 'creatable'; path: string; parent: INode; name: string }
  | { kind: 'not-a-directory'; path: string }
  | { kind: 'missing'; path: string }
  | { kind: 'directory-marked'; path: string }
  | { kind: 'marked-file'; path: string };

export type Intent = 'lookup' | 'create';

/**
 * Classify `rawPath` against the tree. Never mutates.
 *
 * A raw form ending with a separator names a directory: an existing file
 * there is `marked-file`, an absent target is `directory-marked`. Otherwise
 * the deepest existing ancestor decides: a directory parent makes it
 * `creatable`, a file anywhere on the way makes it `not-a-directory`, a
 * missing parent makes it `missing`.
 */
export function resolvePath(tree: NodeTree, rawPath: string): Resolution {
  const path = canonical(rawPath);
  const marked = hasTrailingSeparator(rawPath);
  const node = tree.lookup(path);
  if (node) {
    if (marked && node.kind !== 'directory') return { kind: 'marked-file', path };
    return { kind: 'found', path, node };
  }

  for (const ancestor of ancestors(path)) {
    const a = tree.lookup(ancestor);
    if (!a) break;
    if (a.kind !== 'directory') return { kind: 'not-a-directory', path };
  }

  if (marked) return { kind: 'directory-marked', path };

  const parent = tree.lookup(dirname(path));
  if (parent && parent.kind === 'directory') {
    return { kind: 'creatable', path, parent, name: basename(path) };
  }
  return { kind: 'missing', path };
}

/**
 * Error for a resolution that did not yield a usable target. A
 * directory-marked path only conflicts when the caller meant to create a
 * file; a plain lookup reports it as missing. A file named as a directory is
 * a conflict when creating and not a directory otherwise.
 */
export function resolutionError(
  resolution: Exclude<Resolution, { kind: 'found' }>,
  op: string,
  rawPath: string,
  intent: Intent = 'lookup',
): VFSError {
  switch (resolution.kind) {
    case 'not-a-directory':
      return new VFSError(ErrorCode.ENOTDIR, op, rawPath);
    case 'directory-marked':
      return new VFSError(intent === 'create' ? ErrorCode.EISDIR : ErrorCode.ENOENT, op, rawPath);
    case 'marked-file':
      return new VFSError(intent === 'create' ? ErrorCode.EISDIR : ErrorCode.ENOTDIR, op, rawPath);
    case 'missing':
    case 'creatable':
      return new VFSError(ErrorCode.ENOENT, op, rawPath);
  }
}
