import type { NodeTree } from './NodeTree.js';
import type { INode, WalkResult } from './types.js';
import { SKIP_ALL, SKIP_DIR } from './types.js';

/** How the walker sees a tree: which nodes are directories, and their entries in order. */
export interface WalkSource<T> {
  isDirectory(node: T): boolean;
  children(node: T): T[];
}

export type NodeVisitor<T> = (node: T) => WalkResult;

type Outcome = 'continue' | 'skip-rest' | 'stop';

export function treeSource(tree: NodeTree): WalkSource<INode> {
  return {
    isDirectory: (node) => node.kind === 'directory',
    children: (node) => tree.children(node),
  };
}

/**
 * Pre-order, depth-first walk from `start`. A directory is listed after its
 * own visit; its entries are visited in the order the source lists them, and
 * a subdirectory is walked to the end before its next sibling.
 *
 * - `SKIP_DIR` from a directory prunes that directory's subtree.
 * - `SKIP_DIR` from a file skips the remaining entries of its directory.
 * - `SKIP_ALL` ends the walk.
 * - Anything thrown by the visitor propagates unchanged.
 */
export function walkTree<T>(source: WalkSource<T>, start: T, visit: NodeVisitor<T>): void {
  walkNode(source, start, visit);
}

function toOutcome(result: WalkResult): Outcome {
  if (result === SKIP_ALL) return 'stop';
  if (result === SKIP_DIR) return 'skip-rest';
  return 'continue';
}

function walkNode<T>(source: WalkSource<T>, node: T, visit: NodeVisitor<T>): Outcome {
  const self = toOutcome(visit(node));
  if (self !== 'continue') return self;

  // Listed after the visit, so entries the visitor added or removed count.
  // A detached directory still lists the children it held.
  const entries = source.isDirectory(node) ? source.children(node) : [];

  for (const entry of entries) {
    if (source.isDirectory(entry)) {
      // A pruned subdirectory only affects itself.
      if (walkNode(source, entry, visit) === 'stop') return 'stop';
      continue;
    }
    const outcome = toOutcome(visit(entry));
    if (outcome === 'stop') return 'stop';
    if (outcome === 'skip-rest') break;
  }
  return 'continue';
}
