export type NodeKind = 'file' | 'directory';

export type NodeId = number;

export interface INode {
  id: NodeId;
  kind: NodeKind;
  path: string;                    // canonical absolute path, e.g. "/etc/hosts"
  name: string;                    // base name ("/" for the root)
  data: Uint8Array;                // file content (always empty for dirs)
  mode: number;                    // permission bits, umask already applied
  mtime: Date;
  parent: NodeId | null;           // null only for the root
  children: Map<string, NodeId>;   // canonical path -> id (empty map for files)
}

// ─── Views ───

/** Metadata of a file or directory. */
export interface FileInfo {
  name(): string;
  size(): number;
  mode(): number;
  modTime(): Date;
  isDirectory(): boolean;
  isFile(): boolean;
}

/** An entry handed to a walk visitor. */
export interface DirEntry {
  name(): string;
  isDirectory(): boolean;
  info(): FileInfo;
}

/** An open handle with its own cursor. */
export interface File {
  name(): string;
  close(): void;
  stat(): FileInfo;
  /** Returns the number of bytes copied into `buffer`; 0 at end of stream. */
  read(buffer: Uint8Array): number;
  write(data: string | Uint8Array): number;
  seek(offset: number, whence: WhenceType): number;
}

// ─── Open flags ───

/** Linux `open(2)` values. Combine with `|`. */
export const OpenFlags = {
  O_RDONLY: 0,
  O_WRONLY: 1,
  O_RDWR: 2,
  O_ACCMODE: 3,
  O_CREAT: 0o100,
  O_EXCL: 0o200,
  O_TRUNC: 0o1000,
  O_APPEND: 0o2000,
} as const;

export const Whence = {
  SEEK_SET: 0,
  SEEK_CUR: 1,
  SEEK_END: 2,
} as const;

export type WhenceType = (typeof Whence)[keyof typeof Whence];

export function accessMode(flags: number): number {
  return flags & OpenFlags.O_ACCMODE;
}

export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) !== 0;
}

// ─── Walk ───

export const SKIP_DIR: unique symbol = Symbol('skip-dir');
export const SKIP_ALL: unique symbol = Symbol('skip-all');

export type WalkResult = void | typeof SKIP_DIR | typeof SKIP_ALL;

/**
 * Called once per visited path. `err` is only set when the walk root itself
 * could not be resolved, in which case `entry` is null. Throw to abort the
 * walk; the thrown value propagates out of `walkDir`.
 */
export type WalkDirFunc = (path: string, entry: DirEntry | null, err: VFSError | null) => WalkResult;

// ─── Filesystem surface ───

export interface FileSystem {
  create(path: string): File;
  open(path: string): File;
  openFile(path: string, flags: number, mode?: number): File;
  stat(path: string): FileInfo;
  mkdir(path: string, mode?: number): void;
  mkdirAll(path: string, mode?: number): void;
  walkDir(root: string, fn: WalkDirFunc): void;
  truncate(path: string, size: number): void;
  readFile(path: string): Uint8Array;
  readFileString(path: string): string;
  writeFile(path: string, data: string | Uint8Array, mode?: number): void;
  remove(path: string): void;
  removeAll(path: string): void;
}

// ─── Errors ───

export const ErrorCode = {
  ENOENT: 'ENOENT',
  ENOTDIR: 'ENOTDIR',
  EISDIR: 'EISDIR',
  EEXIST: 'EEXIST',
  ENOTEMPTY: 'ENOTEMPTY',
  EPERM: 'EPERM',
  EBADF: 'EBADF',
  EINVAL: 'EINVAL',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const DESCRIPTIONS: Record<ErrorCodeType, string> = {
  ENOENT: 'no such file or directory',
  ENOTDIR: 'not a directory',
  EISDIR: 'is a directory',
  EEXIST: 'file exists',
  ENOTEMPTY: 'directory not empty',
  EPERM: 'operation not permitted',
  EBADF: 'bad file descriptor',
  EINVAL: 'invalid argument',
};

export class VFSError extends Error {
  code: ErrorCodeType;
  op: string;
  path: string;

  constructor(code: ErrorCodeType, op: string, path: string, detail?: string) {
    super(`${code}: ${op} '${path}': ${detail ?? DESCRIPTIONS[code]}`);
    this.code = code;
    this.op = op;
    this.path = path;
    this.name = 'VFSError';
  }
}

export function isErrorCode(value: unknown): value is ErrorCodeType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ErrorCode, value);
}
