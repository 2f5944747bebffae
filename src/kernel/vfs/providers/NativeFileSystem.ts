import * as nodeFs from 'node:fs';
import { basename, join } from '../../../utils/path.js';
import { decode, toBytes } from '../../../utils/encoding.js';
import { walkTree } from '../walker.js';
import type { WalkSource } from '../walker.js';
import type { DirEntry, File, FileInfo, FileSystem, WalkDirFunc, WhenceType } from '../types.js';
import { VFSError, ErrorCode, OpenFlags, Whence, accessMode, hasFlag, isErrorCode } from '../types.js';

export interface NativeStats {
  isFile(): boolean;
  isDirectory(): boolean;
  size: number;
  mode: number;
  mtime: Date;
}

/**
 * The subset of Node.js `fs` sync methods we forward to. Defaults to
 * `node:fs`; tests may pass a stand-in.
 */
export interface NativeFsModule {
  constants: {
    O_RDONLY: number;
    O_WRONLY: number;
    O_RDWR: number;
    O_CREAT: number;
    O_EXCL: number;
    O_TRUNC: number;
    O_APPEND: number;
  };
  openSync(path: string, flags: number, mode?: number): number;
  closeSync(fd: number): void;
  readSync(fd: number, buffer: Uint8Array, offset: number, length: number, position: number | null): number;
  writeSync(fd: number, buffer: Uint8Array, offset: number, length: number, position: number | null): number;
  fstatSync(fd: number): NativeStats;
  statSync(path: string): NativeStats;
  lstatSync(path: string): NativeStats;
  readdirSync(path: string): string[];
  truncateSync(path: string, len: number): void;
  readFileSync(path: string): Uint8Array;
  writeFileSync(path: string, data: Uint8Array, options: { mode: number }): void;
  unlinkSync(path: string): void;
  rmdirSync(path: string): void;
  mkdirSync(path: string, options: { recursive: boolean; mode: number }): void;
  rmSync(path: string, options: { recursive: boolean; force: boolean }): void;
}

// ─── Error mapping ───

function wrapError(err: unknown, op: string, path: string): VFSError {
  if (err instanceof VFSError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
  return new VFSError(isErrorCode(code) ? code : ErrorCode.EINVAL, op, path, msg);
}

function attempt<T>(op: string, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (err: unknown) {
    throw wrapError(err, op, path);
  }
}

// ─── Metadata ───

class NativeFileInfo implements FileInfo, DirEntry {
  constructor(
    private readonly baseName: string,
    private readonly stats: NativeStats,
  ) {}

  name(): string {
    return this.baseName;
  }

  size(): number {
    return this.stats.size;
  }

  mode(): number {
    return this.stats.mode & 0o7777;
  }

  modTime(): Date {
    return this.stats.mtime;
  }

  isDirectory(): boolean {
    return this.stats.isDirectory();
  }

  isFile(): boolean {
    return this.stats.isFile();
  }

  info(): FileInfo {
    return this;
  }
}

// ─── Handles ───

/** A host file descriptor plus the position we track for `seek`. */
class NativeFile implements File {
  private position = 0;
  private closed = false;

  constructor(
    private readonly fs: NativeFsModule,
    private readonly fd: number,
    private readonly path: string,
    private readonly flags: number,
  ) {}

  name(): string {
    return basename(this.path);
  }

  close(): void {
    this.assertOpen('close');
    attempt('close', this.path, () => this.fs.closeSync(this.fd));
    this.closed = true;
  }

  stat(): FileInfo {
    this.assertOpen('stat');
    return new NativeFileInfo(this.name(), attempt('stat', this.path, () => this.fs.fstatSync(this.fd)));
  }

  read(buffer: Uint8Array): number {
    this.assertOpen('read');
    if (this.position < 0) {
      throw new VFSError(ErrorCode.EINVAL, 'read', this.path, 'negative offset');
    }
    const n = attempt('read', this.path, () => this.fs.readSync(this.fd, buffer, 0, buffer.length, this.position));
    this.position += n;
    return n;
  }

  write(content: string | Uint8Array): number {
    this.assertOpen('write');
    const src = toBytes(content);
    const append = hasFlag(this.flags, OpenFlags.O_APPEND);
    if (!append && this.position < 0) {
      throw new VFSError(ErrorCode.EINVAL, 'write', this.path, 'negative offset');
    }
    const n = attempt('write', this.path, () =>
      this.fs.writeSync(this.fd, src, 0, src.length, append ? null : this.position),
    );
    this.position = append ? this.currentSize('write') : this.position + n;
    return n;
  }

  seek(offset: number, whence: WhenceType): number {
    this.assertOpen('seek');
    let target: number;
    switch (whence) {
      case Whence.SEEK_SET:
        target = offset;
        break;
      case Whence.SEEK_CUR:
        target = this.position + offset;
        break;
      case Whence.SEEK_END:
        target = this.currentSize('seek') + offset;
        break;
      default:
        throw new VFSError(ErrorCode.EINVAL, 'seek', this.path, `invalid whence ${String(whence)}`);
    }
    if (!Number.isSafeInteger(target)) {
      throw new VFSError(ErrorCode.EINVAL, 'seek', this.path, `invalid offset ${target}`);
    }
    this.position = target;
    return this.position;
  }

  private currentSize(op: string): number {
    return attempt(op, this.path, () => this.fs.fstatSync(this.fd)).size;
  }

  private assertOpen(op: string): void {
    if (this.closed) {
      throw new VFSError(ErrorCode.EINVAL, op, this.path, 'file already closed');
    }
  }
}

// ─── Filesystem ───

interface NativeEntry {
  path: string;
  info: NativeFileInfo;
}

/**
 * A FileSystem that forwards every call to the host filesystem. Paths are
 * handed to the host unchanged.
 */
export class NativeFileSystem implements FileSystem {
  private readonly fs: NativeFsModule;

  constructor(fsModule: NativeFsModule = nodeFs) {
    this.fs = fsModule;
  }

  create(path: string): File {
    return this.openFile(path, OpenFlags.O_RDWR | OpenFlags.O_CREAT | OpenFlags.O_TRUNC, 0o666);
  }

  open(path: string): File {
    return this.openFile(path, OpenFlags.O_RDONLY);
  }

  openFile(path: string, flags: number, mode: number = 0o666): File {
    const fd = attempt('open', path, () => this.fs.openSync(path, this.hostFlags(flags), mode));
    return new NativeFile(this.fs, fd, path, flags);
  }

  stat(path: string): FileInfo {
    return new NativeFileInfo(basename(path), attempt('stat', path, () => this.fs.statSync(path)));
  }

  mkdir(path: string, mode: number = 0o777): void {
    attempt('mkdir', path, () => this.fs.mkdirSync(path, { recursive: false, mode }));
  }

  mkdirAll(path: string, mode: number = 0o777): void {
    attempt('mkdir', path, () => this.fs.mkdirSync(path, { recursive: true, mode }));
  }

  walkDir(root: string, fn: WalkDirFunc): void {
    let start: NativeEntry;
    try {
      start = this.entry(root);
    } catch (err: unknown) {
      fn(root, null, wrapError(err, 'lstat', root));
      return;
    }

    const source: WalkSource<NativeEntry> = {
      isDirectory: (e) => e.info.isDirectory(),
      children: (e) =>
        attempt('readdir', e.path, () => this.fs.readdirSync(e.path))
          .sort()
          .map((name) => this.entry(join(e.path, name))),
    };
    walkTree(source, start, (e) => fn(e.path, e.info, null));
  }

  truncate(path: string, size: number): void {
    attempt('truncate', path, () => this.fs.truncateSync(path, size));
  }

  readFile(path: string): Uint8Array {
    return attempt('read', path, () => this.fs.readFileSync(path));
  }

  readFileString(path: string): string {
    return decode(this.readFile(path));
  }

  writeFile(path: string, data: string | Uint8Array, mode: number = 0o666): void {
    attempt('open', path, () => this.fs.writeFileSync(path, toBytes(data), { mode }));
  }

  remove(path: string): void {
    const stats = attempt('remove', path, () => this.fs.lstatSync(path));
    if (stats.isDirectory()) {
      attempt('remove', path, () => this.fs.rmdirSync(path));
    } else {
      attempt('remove', path, () => this.fs.unlinkSync(path));
    }
  }

  removeAll(path: string): void {
    attempt('remove', path, () => this.fs.rmSync(path, { recursive: true, force: true }));
  }

  // ─── Internal helpers ───

  private entry(path: string): NativeEntry {
    return { path, info: new NativeFileInfo(basename(path), attempt('lstat', path, () => this.fs.lstatSync(path))) };
  }

  /** Our flag bits are Linux's; the host may number them differently. */
  private hostFlags(flags: number): number {
    const c = this.fs.constants;
    const access = accessMode(flags);
    let result = access === OpenFlags.O_WRONLY ? c.O_WRONLY : access === OpenFlags.O_RDWR ? c.O_RDWR : c.O_RDONLY;
    if (hasFlag(flags, OpenFlags.O_CREAT)) result |= c.O_CREAT;
    if (hasFlag(flags, OpenFlags.O_EXCL)) result |= c.O_EXCL;
    if (hasFlag(flags, OpenFlags.O_TRUNC)) result |= c.O_TRUNC;
    if (hasFlag(flags, OpenFlags.O_APPEND)) result |= c.O_APPEND;
    return result;
  }
}
