// Filesystem
export {
  MemFS,
  createMemFS,
  MemFile,
  NativeFileSystem,
  withFile,
  withDirectory,
  VFSError,
  ErrorCode,
  OpenFlags,
  Whence,
  SKIP_DIR,
  SKIP_ALL,
} from './kernel/vfs/index.js';
export type {
  MemFSOptions,
  SeedEntry,
  File,
  FileInfo,
  DirEntry,
  FileSystem,
  WalkDirFunc,
  WalkResult,
  WhenceType,
  ErrorCodeType,
  NativeFsModule,
  NativeStats,
} from './kernel/vfs/index.js';

// Clock
export { systemClock, fixedClock } from './kernel/clock.js';
export type { Clock } from './kernel/clock.js';

// Configuration & logging
export { loadConfig, ConfigError } from './config.js';
export type { MemFSConfig, LogLevel, EnvSource } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
