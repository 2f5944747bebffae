import { join } from '../../utils/path.js';
import type { INode, NodeId, NodeKind } from './types.js';
import { VFSError, ErrorCode } from './types.js';

/**
 * Arena of nodes addressed by id, plus the flat path index.
 *
 * Parent and child links are ids into the arena. `insert` and `detach` are
 * the only mutators of structure and always update the arena, the index and
 * the parent's `children` together.
 */
export class NodeTree {
  private arena = new Map<NodeId, INode>();
  private index = new Map<string, NodeId>();
  private nextId: NodeId = 0;
  private readonly rootId: NodeId;

  constructor(rootMode: number, mtime: Date) {
    const root = this.allocate('directory', '/', '/', rootMode, mtime, null);
    this.rootId = root.id;
  }

  get size(): number {
    return this.arena.size;
  }

  root(): INode {
    return this.mustGet(this.rootId);
  }

  isRoot(node: INode): boolean {
    return node.id === this.rootId;
  }

  get(id: NodeId): INode | undefined {
    return this.arena.get(id);
  }

  /** Lookup by canonical path through the flat index. */
  lookup(path: string): INode | undefined {
    const id = this.index.get(path);
    return id === undefined ? undefined : this.arena.get(id);
  }

  parentOf(node: INode): INode | undefined {
    return node.parent === null ? undefined : this.get(node.parent);
  }

  /** Immediate children, ascending by canonical path (code-unit order). */
  children(node: INode): INode[] {
    const result: INode[] = [];
    for (const id of node.children.values()) {
      const child = this.get(id);
      if (child) result.push(child);
    }
    return result.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  insert(parent: INode, kind: NodeKind, name: string, mode: number, mtime: Date, data?: Uint8Array): INode {
    const path = join(parent.path, name);
    if (parent.kind !== 'directory') {
      throw new VFSError(ErrorCode.ENOTDIR, 'insert', path);
    }
    if (this.index.has(path)) {
      throw new VFSError(ErrorCode.EEXIST, 'insert', path);
    }

    const node = this.allocate(kind, path, name, mode, mtime, parent.id);
    if (data && kind === 'file') node.data = data;
    parent.children.set(path, node.id);
    return node;
  }

  /** Unlink `node` from its parent, the index and the arena. */
  detach(node: INode): void {
    if (this.isRoot(node)) {
      throw new VFSError(ErrorCode.EPERM, 'remove', node.path);
    }
    this.index.delete(node.path);
    this.parentOf(node)?.children.delete(node.path);
    this.arena.delete(node.id);
  }

  // ─── Internal helpers ───

  private allocate(kind: NodeKind, path: string, name: string, mode: number, mtime: Date, parent: NodeId | null): INode {
    const node: INode = {
      id: this.nextId++,
      kind,
      path,
      name,
      data: new Uint8Array(0),
      mode,
      mtime,
      parent,
      children: new Map(),
    };
    this.arena.set(node.id, node);
    this.index.set(path, node.id);
    return node;
  }

  private mustGet(id: NodeId): INode {
    const node = this.arena.get(id);
    if (!node) {
      throw new VFSError(ErrorCode.EINVAL, 'lookup', `#${id}`, 'dangling node id');
    }
    return node;
  }
}
