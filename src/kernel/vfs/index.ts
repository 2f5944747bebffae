export { MemFS, createMemFS } from './MemFS.js';
export type { MemFSOptions } from './MemFS.js';
export { MemFile } from './MemFile.js';
export { NodeTree } from './NodeTree.js';
export { resolvePath, resolutionError } from './resolver.js';
export type { Resolution, Intent } from './resolver.js';
export { walkTree, treeSource } from './walker.js';
export type { WalkSource, NodeVisitor } from './walker.js';
export { withFile, withDirectory } from './builders.js';
export type { SeedEntry } from './builders.js';
export { VFSError, ErrorCode, OpenFlags, Whence, SKIP_DIR, SKIP_ALL } from './types.js';
export type {
  INode,
  NodeId,
  NodeKind,
  File,
  FileInfo,
  DirEntry,
  FileSystem,
  WalkDirFunc,
  WalkResult,
  WhenceType,
  ErrorCodeType,
} from './types.js';
export { NativeFileSystem } from './providers/NativeFileSystem.js';
export type { NativeFsModule, NativeStats } from './providers/NativeFileSystem.js';
