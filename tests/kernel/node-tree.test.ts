import { describe, it, expect, beforeEach } from 'vitest';
import { NodeTree } from '../../src/kernel/vfs/NodeTree.js';
import { encode } from '../../src/utils/encoding.js';

const T0 = new Date(0);

describe('NodeTree', () => {
  let tree: NodeTree;

  beforeEach(() => {
    tree = new NodeTree(0o755, T0);
  });

  it('starts with a single root directory', () => {
    const root = tree.root();
    expect(root.path).toBe('/');
    expect(root.name).toBe('/');
    expect(root.kind).toBe('directory');
    expect(root.parent).toBeNull();
    expect(root.mode).toBe(0o755);
    expect(tree.size).toBe(1);
    expect(tree.lookup('/')).toBe(root);
    expect(tree.isRoot(root)).toBe(true);
  });

  describe('insert', () => {
    it('links the node into the index and the parent', () => {
      const root = tree.root();
      const a = tree.insert(root, 'directory', 'a', 0o755, T0);
      expect(a.path).toBe('/a');
      expect(a.name).toBe('a');
      expect(tree.lookup('/a')).toBe(a);
      expect(root.children.get('/a')).toBe(a.id);
      expect(tree.parentOf(a)).toBe(root);
      expect(tree.size).toBe(2);
    });

    it('derives the child path from the parent path and name', () => {
      const a = tree.insert(tree.root(), 'directory', 'a', 0o755, T0);
      const f = tree.insert(a, 'file', 'f.txt', 0o644, T0, encode('hi'));
      expect(f.path).toBe('/a/f.txt');
      expect(f.parent).toBe(a.id);
      expect(Array.from(f.data)).toEqual([104, 105]);
    });

    it('never gives directories content', () => {
      const d = tree.insert(tree.root(), 'directory', 'd', 0o755, T0, encode('ignored'));
      expect(d.data.length).toBe(0);
    });

    it('refuses to insert under a file', () => {
      const f = tree.insert(tree.root(), 'file', 'f', 0o644, T0);
      expect(() => tree.insert(f, 'file', 'x', 0o644, T0)).toThrow(/^ENOTDIR: insert '\/f\/x'/);
      expect(tree.lookup('/f/x')).toBeUndefined();
    });

    it('refuses duplicates', () => {
      tree.insert(tree.root(), 'file', 'f', 0o644, T0);
      expect(() => tree.insert(tree.root(), 'directory', 'f', 0o755, T0)).toThrow(/^EEXIST/);
      expect(tree.size).toBe(2);
    });
  });

  describe('children', () => {
    it('lists entries in ascending path order', () => {
      const root = tree.root();
      tree.insert(root, 'file', 'x', 0o644, T0);
      tree.insert(root, 'directory', 'b', 0o755, T0);
      tree.insert(root, 'file', 'a', 0o644, T0);
      expect(tree.children(root).map((n) => n.path)).toEqual(['/a', '/b', '/x']);
    });

    it('orders by code unit, not locale', () => {
      const root = tree.root();
      tree.insert(root, 'file', 'b', 0o644, T0);
      tree.insert(root, 'file', 'B', 0o644, T0);
      tree.insert(root, 'file', 'a', 0o644, T0);
      expect(tree.children(root).map((n) => n.name)).toEqual(['B', 'a', 'b']);
    });

    it('is empty for files', () => {
      const f = tree.insert(tree.root(), 'file', 'f', 0o644, T0);
      expect(tree.children(f)).toEqual([]);
    });
  });

  describe('detach', () => {
    it('removes the node from the index, the parent and the arena', () => {
      const root = tree.root();
      const a = tree.insert(root, 'file', 'a', 0o644, T0);
      tree.detach(a);
      expect(tree.lookup('/a')).toBeUndefined();
      expect(root.children.has('/a')).toBe(false);
      expect(tree.get(a.id)).toBeUndefined();
      expect(tree.size).toBe(1);
    });

    it('refuses the root', () => {
      expect(() => tree.detach(tree.root())).toThrow(/^EPERM: remove '\/'/);
      expect(tree.size).toBe(1);
    });

    it('detaches a child whose parent is already gone', () => {
      const d = tree.insert(tree.root(), 'directory', 'd', 0o755, T0);
      const f = tree.insert(d, 'file', 'f', 0o644, T0);
      tree.detach(d);
      expect(tree.lookup('/d/f')).toBe(f);
      expect(tree.parentOf(f)).toBeUndefined();
      expect(tree.children(d)).toEqual([f]);
      tree.detach(f);
      expect(tree.lookup('/d/f')).toBeUndefined();
      expect(tree.size).toBe(1);
    });

    it('frees the path for reuse', () => {
      const a = tree.insert(tree.root(), 'file', 'a', 0o644, T0);
      tree.detach(a);
      const again = tree.insert(tree.root(), 'directory', 'a', 0o755, T0);
      expect(again.id).not.toBe(a.id);
      expect(tree.lookup('/a')).toBe(again);
    });
  });
});
