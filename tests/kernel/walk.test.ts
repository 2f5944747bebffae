import { describe, it, expect } from 'vitest';
import { MemFS, SKIP_ALL, SKIP_DIR, VFSError, withFile } from '../../src/kernel/vfs/index.js';
import type { DirEntry, SeedEntry, WalkResult } from '../../src/kernel/vfs/index.js';
import { walkTree } from '../../src/kernel/vfs/walker.js';
import type { WalkSource } from '../../src/kernel/vfs/walker.js';
import type { MemFSConfig } from '../../src/config.js';

const config: MemFSConfig = { logLevel: 'silent', umask: 0o022 };

function makeFs(...entries: SeedEntry[]): MemFS {
  return new MemFS({ config, clock: () => new Date(0), entries });
}

function collect(fs: MemFS, root: string, onVisit: (path: string) => WalkResult = () => undefined): string[] {
  const visited: string[] = [];
  fs.walkDir(root, (path) => {
    visited.push(path);
    return onVisit(path);
  });
  return visited;
}

describe('walkDir', () => {
  const sample = () => makeFs(withFile('/a/x', 'x'), withFile('/a/b/y', 'y'));

  it('visits pre-order, descending into a directory before its next sibling', () => {
    expect(collect(sample(), '/a')).toEqual(['/a', '/a/b', '/a/b/y', '/a/x']);
  });

  it('orders entries by path, not directories first', () => {
    const fs = makeFs(withFile('/a/x'), withFile('/a/b/y'), withFile('/a/a.txt'));
    expect(collect(fs, '/a')).toEqual(['/a', '/a/a.txt', '/a/b', '/a/b/y', '/a/x']);
  });

  it('walks the whole tree from the root', () => {
    expect(collect(sample(), '/')).toEqual(['/', '/a', '/a/b', '/a/b/y', '/a/x']);
  });

  it('visits just the file when started on a file', () => {
    expect(collect(sample(), '/a/x')).toEqual(['/a/x']);
  });

  it('canonicalizes the start path', () => {
    expect(collect(sample(), 'a/b/../b/')).toEqual(['/a/b', '/a/b/y']);
  });

  it('hands the visitor an entry view and no error', () => {
    const seen: Array<{ path: string; name: string; dir: boolean; size: number; err: VFSError | null }> = [];
    sample().walkDir('/a', (path, entry, err) => {
      if (entry) {
        seen.push({ path, name: entry.name(), dir: entry.isDirectory(), size: entry.info().size(), err });
      }
    });
    expect(seen).toEqual([
      { path: '/a', name: 'a', dir: true, size: 0, err: null },
      { path: '/a/b', name: 'b', dir: true, size: 0, err: null },
      { path: '/a/b/y', name: 'y', dir: false, size: 1, err: null },
      { path: '/a/x', name: 'x', dir: false, size: 1, err: null },
    ]);
  });

  describe('a visitor that changes the tree', () => {
    it('does not see an entry it removed on entering the directory', () => {
      const fs = makeFs(withFile('/d/x'), withFile('/d/y'));
      const visited = collect(fs, '/', (p) => {
        if (p === '/d') fs.remove('/d/x');
      });
      expect(visited).toEqual(['/', '/d', '/d/y']);
    });

    it('sees an entry it created on entering the directory', () => {
      const fs = makeFs(withFile('/d/x'), withFile('/d/y'));
      const visited = collect(fs, '/', (p) => {
        if (p === '/d') fs.writeFile('/d/new', '');
      });
      expect(visited).toEqual(['/', '/d', '/d/new', '/d/x', '/d/y']);
    });
  });

  describe('SKIP_DIR', () => {
    it('prunes a directory and continues with its siblings', () => {
      const visited = collect(sample(), '/a', (p) => (p === '/a/b' ? SKIP_DIR : undefined));
      expect(visited).toEqual(['/a', '/a/b', '/a/x']);
    });

    it('on the start directory ends the walk successfully', () => {
      expect(collect(sample(), '/a', () => SKIP_DIR)).toEqual(['/a']);
    });

    it('on a file skips the rest of its directory', () => {
      const fs = makeFs(withFile('/d/1'), withFile('/d/2'), withFile('/d/3'), withFile('/z'));
      const visited = collect(fs, '/', (p) => (p === '/d/2' ? SKIP_DIR : undefined));
      expect(visited).toEqual(['/', '/d', '/d/1', '/d/2', '/z']);
    });
  });

  describe('SKIP_ALL', () => {
    it('stops the walk and reports success', () => {
      const fs = sample();
      let visited: string[] = [];
      expect(() => {
        visited = collect(fs, '/a', (p) => (p === '/a/b' ? SKIP_ALL : undefined));
      }).not.toThrow();
      expect(visited).toEqual(['/a', '/a/b']);
    });
  });

  describe('errors', () => {
    it('propagates a thrown error and stops', () => {
      const visited: string[] = [];
      expect(() =>
        sample().walkDir('/a', (path) => {
          visited.push(path);
          if (path === '/a/b/y') throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(visited).toEqual(['/a', '/a/b', '/a/b/y']);
    });

    it('reports a missing root to the visitor exactly once', () => {
      const calls: Array<{ path: string; entry: DirEntry | null; code: string | undefined; op: string | undefined }> = [];
      sample().walkDir('/nope', (path, entry, err) => {
        calls.push({ path, entry, code: err?.code, op: err?.op });
      });
      expect(calls).toEqual([{ path: '/nope', entry: null, code: 'ENOENT', op: 'lstat' }]);
    });

    it('lets the visitor propagate the root error', () => {
      expect(() =>
        sample().walkDir('/nope', (_path, _entry, err) => {
          if (err) throw err;
        }),
      ).toThrow(/^ENOENT: lstat '\/nope'/);
    });

    it('lets the visitor suppress the root error with a sentinel', () => {
      expect(() => sample().walkDir('/nope', () => SKIP_DIR)).not.toThrow();
    });

    it('reports ENOTDIR when the root runs through a file', () => {
      const codes: Array<string | undefined> = [];
      sample().walkDir('/a/x/deeper', (_path, _entry, err) => {
        codes.push(err?.code);
      });
      expect(codes).toEqual(['ENOTDIR']);
    });
  });
});

describe('walkTree', () => {
  interface Item {
    name: string;
    items?: Item[];
  }

  const source: WalkSource<Item> = {
    isDirectory: (item) => item.items !== undefined,
    children: (item) => item.items ?? [],
  };

  it('walks any source in the order it lists entries', () => {
    const tree: Item = {
      name: 'root',
      items: [{ name: 'z' }, { name: 'sub', items: [{ name: 'inner' }] }, { name: 'a' }],
    };
    const visited: string[] = [];
    walkTree(source, tree, (item) => {
      visited.push(item.name);
    });
    expect(visited).toEqual(['root', 'z', 'sub', 'inner', 'a']);
  });
});
