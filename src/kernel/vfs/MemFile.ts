import { toBytes } from '../../utils/encoding.js';
import type { DirEntry, File, FileInfo, INode, WhenceType } from './types.js';
import { VFSError, ErrorCode, OpenFlags, Whence, accessMode, hasFlag } from './types.js';

/**
 * An open handle on an in-memory node.
 *
 * The handle references the node rather than owning it: content lives in the
 * node, so every handle on the same node sees the others' writes at once.
 * Only the cursor and the flags are private. A handle is also its own
 * metadata view (`stat()` returns `this`) and walk entry.
 */
export class MemFile implements File, FileInfo, DirEntry {
  private cursor = 0;
  private closed = false;

  constructor(
    private readonly node: INode,
    private readonly flags: number = OpenFlags.O_RDONLY,
  ) {}

  name(): string {
    return this.node.name;
  }

  close(): void {
    if (this.closed) {
      throw new VFSError(ErrorCode.EINVAL, 'close', this.node.path, 'file already closed');
    }
    this.closed = true;
  }

  stat(): FileInfo {
    this.assertOpen('stat');
    return this;
  }

  info(): FileInfo {
    return this.stat();
  }

  // ─── I/O ───

  read(buffer: Uint8Array): number {
    this.assertOpen('read');
    if (this.node.kind === 'directory') {
      throw new VFSError(ErrorCode.EISDIR, 'read', this.node.path);
    }
    if (accessMode(this.flags) === OpenFlags.O_WRONLY) {
      throw new VFSError(ErrorCode.EBADF, 'read', this.node.path, 'file not open for reading');
    }
    if (this.cursor < 0) {
      throw new VFSError(ErrorCode.EINVAL, 'read', this.node.path, 'negative offset');
    }

    const data = this.node.data;
    if (this.cursor >= data.length) return 0;

    const n = Math.min(buffer.length, data.length - this.cursor);
    buffer.set(data.subarray(this.cursor, this.cursor + n), 0);
    this.cursor += n;
    return n;
  }

  write(content: string | Uint8Array): number {
    this.assertOpen('write');
    if (this.node.kind === 'directory' || accessMode(this.flags) === OpenFlags.O_RDONLY) {
      throw new VFSError(ErrorCode.EBADF, 'write', this.node.path);
    }

    const src = toBytes(content);
    if (hasFlag(this.flags, OpenFlags.O_APPEND)) {
      this.cursor = this.node.data.length;
    } else if (this.cursor < 0) {
      throw new VFSError(ErrorCode.EINVAL, 'write', this.node.path, 'negative offset');
    }

    const end = this.cursor + src.length;
    if (end > this.node.data.length) {
      // Grow just enough; anything between the old end and the cursor is zero.
      const grown = new Uint8Array(end);
      grown.set(this.node.data, 0);
      this.node.data = grown;
    }
    this.node.data.set(src, this.cursor);
    this.cursor = end;
    return src.length;
  }

  /**
   * Bounds are not checked here; a bad cursor surfaces on the next read or
   * write. A target that is not a whole number fails and leaves the cursor.
   */
  seek(offset: number, whence: WhenceType): number {
    this.assertOpen('seek');
    let target: number;
    switch (whence) {
      case Whence.SEEK_SET:
        target = offset;
        break;
      case Whence.SEEK_CUR:
        target = this.cursor + offset;
        break;
      case Whence.SEEK_END:
        target = this.node.data.length + offset;
        break;
      default:
        throw new VFSError(ErrorCode.EINVAL, 'seek', this.node.path, `invalid whence ${String(whence)}`);
    }
    if (!Number.isSafeInteger(target)) {
      throw new VFSError(ErrorCode.EINVAL, 'seek', this.node.path, `invalid offset ${target}`);
    }
    this.cursor = target;
    return this.cursor;
  }

  // ─── Metadata ───

  isDirectory(): boolean {
    this.assertOpen('stat');
    return this.node.kind === 'directory';
  }

  isFile(): boolean {
    this.assertOpen('stat');
    return this.node.kind === 'file';
  }

  mode(): number {
    this.assertOpen('stat');
    return this.node.mode;
  }

  modTime(): Date {
    this.assertOpen('stat');
    return new Date(this.node.mtime.getTime());
  }

  size(): number {
    this.assertOpen('stat');
    return this.node.data.length;
  }

  private assertOpen(op: string): void {
    if (this.closed) {
      throw new VFSError(ErrorCode.EINVAL, op, this.node.path, 'file already closed');
    }
  }
}
