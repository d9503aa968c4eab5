import { describe, expect, test } from 'vitest';
import { UnionFind } from '../src/unionFind.js';

describe('UnionFind', () => {
  test('starts with singleton components', () => {
    const uf = new UnionFind(4);
    expect(uf.componentCount).toBe(4);
    expect(uf.connected(0, 1)).toBe(false);
    expect(uf.find(3)).toBe(3);
  });

  test('union reports whether a merge happened', () => {
    const uf = new UnionFind(5);
    expect(uf.union(0, 1)).toBe(true);
    expect(uf.union(1, 0)).toBe(false);
    expect(uf.union(2, 3)).toBe(true);
    expect(uf.union(1, 3)).toBe(true);
    expect(uf.union(0, 2)).toBe(false);

    expect(uf.componentCount).toBe(2);
    expect(uf.connected(0, 3)).toBe(true);
    expect(uf.connected(0, 4)).toBe(false);
    expect(uf.sizeOf(2)).toBe(4);
    expect(uf.sizeOf(4)).toBe(1);
  });

  test('smaller component is attached under the larger root', () => {
    const uf = new UnionFind(4);
    uf.union(0, 1);
    uf.union(0, 2);
    const bigRoot = uf.find(0);

    uf.union(3, 0);
    expect(uf.find(3)).toBe(bigRoot);
  });

  test('find compresses long chains', () => {
    const uf = new UnionFind(64);
    for (let i = 1; i < 64; i++) uf.union(i - 1, i);
    const root = uf.find(63);
    for (let i = 0; i < 64; i++) expect(uf.find(i)).toBe(root);
    expect(uf.componentCount).toBe(1);
  });
});
