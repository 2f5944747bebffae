import { canonical } from '../../utils/path.js';
import { decode, resizeBytes, toBytes } from '../../utils/encoding.js';
import { loadConfig } from '../../config.js';
import type { MemFSConfig } from '../../config.js';
import { createLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import { systemClock } from '../clock.js';
import type { Clock } from '../clock.js';
import { NodeTree } from './NodeTree.js';
import { MemFile } from './MemFile.js';
import { resolvePath, resolutionError } from './resolver.js';
import type { Intent, Resolution } from './resolver.js';
import { treeSource, walkTree } from './walker.js';
import { applySeed, ensureDirectories } from './builders.js';
import type { SeedEntry } from './builders.js';
import type { File, FileInfo, FileSystem, INode, WalkDirFunc } from './types.js';
import { VFSError, ErrorCode, OpenFlags, hasFlag } from './types.js';

export interface MemFSOptions {
  /** Stamps modification times. Defaults to the system clock. */
  clock?: Clock;
  /** Cleared from every requested mode. Defaults to the configured umask (022). */
  umask?: number;
  logger?: Logger;
  /** Applied in order before the instance is handed out. */
  entries?: SeedEntry[];
  /** Defaults to `loadConfig()` over `process.env`. */
  config?: MemFSConfig;
}

const DEFAULT_FILE_MODE = 0o666;
const DEFAULT_DIR_MODE = 0o777;

/**
 * In-memory filesystem with the surface of a real one.
 *
 * Every operation resolves its path first and only mutates the tree once
 * the resolution is known to succeed. Nothing here locks: callers sharing an
 * instance across concurrent tasks must serialize access themselves.
 */
export class MemFS implements FileSystem {
  private readonly tree: NodeTree;
  private readonly clock: Clock;
  private readonly umask: number;
  private readonly log: Logger;

  constructor(options: MemFSOptions = {}) {
    const config = options.config ?? loadConfig();
    this.clock = options.clock ?? systemClock;
    this.umask = options.umask ?? config.umask;
    this.log = options.logger ?? createLogger(config.logLevel);
    this.tree = new NodeTree(this.applyUmask(DEFAULT_DIR_MODE), this.clock());

    for (const entry of options.entries ?? []) {
      applySeed(this.tree, entry, {
        dirMode: this.applyUmask(DEFAULT_DIR_MODE),
        fileMode: this.applyUmask(DEFAULT_FILE_MODE),
        mtime: this.clock(),
      });
    }
  }

  // ─── Open / create ───

  create(path: string): File {
    return this.openFile(path, OpenFlags.O_RDWR | OpenFlags.O_CREAT | OpenFlags.O_TRUNC, DEFAULT_FILE_MODE);
  }

  open(path: string): File {
    return new MemFile(this.lookup('open', path), OpenFlags.O_RDONLY);
  }

  openFile(path: string, flags: number, mode: number = DEFAULT_FILE_MODE): File {
    const r = resolvePath(this.tree, path);

    if (r.kind === 'found') {
      const node = r.node;
      if (node.kind === 'directory') {
        throw new VFSError(ErrorCode.EISDIR, 'open', path);
      }
      if (hasFlag(flags, OpenFlags.O_CREAT) && hasFlag(flags, OpenFlags.O_EXCL)) {
        throw new VFSError(ErrorCode.EEXIST, 'open', path);
      }
      if (hasFlag(flags, OpenFlags.O_TRUNC)) {
        node.data = new Uint8Array(0);
        node.mtime = this.clock();
      }
      return new MemFile(node, flags);
    }

    if (r.kind === 'creatable' && hasFlag(flags, OpenFlags.O_CREAT)) {
      const node = this.tree.insert(r.parent, 'file', r.name, this.applyUmask(mode), this.clock());
      this.log.debug({ op: 'create', path: node.path }, 'file created');
      return new MemFile(node, flags);
    }

    throw this.fail(r, 'open', path, 'create');
  }

  stat(path: string): FileInfo {
    return new MemFile(this.lookup('stat', path));
  }

  // ─── Directories ───

  mkdir(path: string, mode: number = DEFAULT_DIR_MODE): void {
    const r = resolvePath(this.tree, canonical(path));
    if (r.kind === 'found') {
      throw new VFSError(ErrorCode.EEXIST, 'mkdir', path);
    }
    if (r.kind !== 'creatable') {
      throw this.fail(r, 'mkdir', path);
    }
    const node = this.tree.insert(r.parent, 'directory', r.name, this.applyUmask(mode), this.clock());
    this.log.debug({ op: 'mkdir', path: node.path }, 'directory created');
  }

  mkdirAll(path: string, mode: number = DEFAULT_DIR_MODE): void {
    const before = this.tree.size;
    ensureDirectories(this.tree, path, this.applyUmask(mode), this.clock(), 'mkdir');
    this.log.debug({ op: 'mkdirAll', path: canonical(path), created: this.tree.size - before }, 'directories ensured');
  }

  /**
   * If `root` does not resolve, `fn` is called once with the error; a visitor
   * that returns (with or without a sentinel) swallows it, one that throws
   * propagates it.
   */
  walkDir(root: string, fn: WalkDirFunc): void {
    const r = resolvePath(this.tree, root);
    if (r.kind !== 'found') {
      fn(r.path, null, this.fail(r, 'lstat', root));
      return;
    }
    walkTree(treeSource(this.tree), r.node, (node) => fn(node.path, new MemFile(node), null));
  }

  // ─── Whole-file operations ───

  /** Shrinks or zero-fills `path` to exactly `size` bytes. */
  truncate(path: string, size: number): void {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new VFSError(ErrorCode.EINVAL, 'truncate', path, `invalid size ${size}`);
    }
    const node = this.lookupFile('truncate', path);
    node.data = resizeBytes(node.data, size);
    node.mtime = this.clock();
    this.log.debug({ op: 'truncate', path: node.path, size }, 'file truncated');
  }

  /** A copy of the content; mutating it does not touch the file. */
  readFile(path: string): Uint8Array {
    return new Uint8Array(this.lookupFile('read', path).data);
  }

  readFileString(path: string): string {
    return decode(this.readFile(path));
  }

  writeFile(path: string, data: string | Uint8Array, mode: number = DEFAULT_FILE_MODE): void {
    const r = resolvePath(this.tree, path);

    if (r.kind === 'found') {
      if (r.node.kind === 'directory') {
        throw new VFSError(ErrorCode.EISDIR, 'open', path);
      }
      r.node.data = toBytes(data);
      r.node.mtime = this.clock();
      return;
    }

    if (r.kind !== 'creatable') {
      throw this.fail(r, 'open', path, 'create');
    }
    const node = this.tree.insert(r.parent, 'file', r.name, this.applyUmask(mode), this.clock(), toBytes(data));
    this.log.debug({ op: 'create', path: node.path }, 'file created');
  }

  // ─── Removal ───

  remove(path: string): void {
    const node = this.lookup('remove', path);
    if (this.tree.isRoot(node)) {
      throw new VFSError(ErrorCode.EPERM, 'remove', path);
    }
    if (node.kind === 'directory' && node.children.size > 0) {
      throw new VFSError(ErrorCode.ENOTEMPTY, 'remove', path);
    }
    this.tree.detach(node);
    this.log.debug({ op: 'remove', path: node.path }, 'node removed');
  }

  /**
   * Detach `path` and everything below it, in walk order. A missing path is
   * not an error. Hitting the tree root fails with EPERM.
   */
  removeAll(path: string): void {
    const r = resolvePath(this.tree, path);
    if (r.kind === 'not-a-directory' || r.kind === 'marked-file') {
      throw this.fail(r, 'remove', path);
    }
    if (r.kind !== 'found') return;

    let removed = 0;
    walkTree(treeSource(this.tree), r.node, (node) => {
      if (this.tree.isRoot(node)) {
        throw new VFSError(ErrorCode.EPERM, 'remove', node.path);
      }
      this.tree.detach(node);
      removed++;
    });
    this.log.debug({ op: 'removeAll', path: r.path, removed }, 'subtree removed');
  }

  // ─── Debugging ───

  /**
   * Breadth-first listing of the tree, one node per line, siblings in path
   * order: "/dir: (Directory)" or "/file: `content'".
   */
  dump(): string {
    const lines: string[] = [];
    const queue: INode[] = [this.tree.root()];
    for (let i = 0; i < queue.length; i++) {
      const node = queue[i];
      const content = node.kind === 'directory' ? '(Directory)' : '`' + decode(node.data) + "'";
      lines.push(`${node.path}: ${content}`);
      queue.push(...this.tree.children(node));
    }
    return lines.join('\n');
  }

  toString(): string {
    return this.dump();
  }

  // ─── Internal helpers ───

  private applyUmask(mode: number): number {
    return mode & ~this.umask & 0o7777;
  }

  private lookup(op: string, path: string): INode {
    const r = resolvePath(this.tree, path);
    if (r.kind !== 'found') throw this.fail(r, op, path);
    return r.node;
  }

  private lookupFile(op: string, path: string): INode {
    const node = this.lookup(op === 'read' ? 'open' : op, path);
    if (node.kind === 'directory') {
      throw new VFSError(ErrorCode.EISDIR, op, path);
    }
    return node;
  }

  private fail(r: Exclude<Resolution, { kind: 'found' }>, op: string, path: string, intent: Intent = 'lookup'): VFSError {
    const err = resolutionError(r, op, path, intent);
    this.log.trace({ op, path, code: err.code }, 'path did not resolve');
    return err;
  }
}

export function createMemFS(...entries: SeedEntry[]): MemFS {
  return new MemFS({ entries });
}
