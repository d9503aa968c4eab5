import { describe, expect, test } from 'vitest';
import { PriorityFrontier, QueueFrontier, StackFrontier } from '../src/frontier.js';

describe('StackFrontier', () => {
  test('pops last in, first out', () => {
    const f = new StackFrontier();
    f.push(1);
    f.push(2);
    f.push(3);
    expect(f.peek()).toBe(3);
    expect([...f.cells()]).toEqual([3, 2, 1]);
    expect(f.toArray()).toEqual([1, 2, 3]);
    expect(f.pop()).toBe(3);
    expect(f.pop()).toBe(2);
    expect(f.size).toBe(1);
  });

  test('empty pop and peek return undefined', () => {
    const f = new StackFrontier();
    expect(f.pop()).toBeUndefined();
    expect(f.peek()).toBeUndefined();
  });
});

describe('QueueFrontier', () => {
  test('pops first in, first out', () => {
    const f = new QueueFrontier();
    for (const c of [4, 5, 6]) f.push(c);
    expect(f.peek()).toBe(4);
    expect(f.pop()).toBe(4);
    expect([...f.cells()]).toEqual([5, 6]);
    expect(f.size).toBe(2);
  });

  test('keeps order across compaction', () => {
    const f = new QueueFrontier();
    for (let i = 0; i < 3000; i++) f.push(i);
    for (let i = 0; i < 2000; i++) expect(f.pop()).toBe(i);
    expect(f.size).toBe(1000);
    expect(f.peek()).toBe(2000);
    f.push(9999);
    expect(f.size).toBe(1001);
  });
});

describe('PriorityFrontier', () => {
  test('pops the smallest key', () => {
    const f = new PriorityFrontier();
    f.push(10, 5);
    f.push(11, 1);
    f.push(12, 3);
    expect(f.peekKey()).toBe(1);
    expect(f.pop()).toBe(11);
    expect(f.pop()).toBe(12);
    expect(f.pop()).toBe(10);
    expect(f.pop()).toBeUndefined();
  });

  test('equal keys pop in insertion order', () => {
    const f = new PriorityFrontier();
    for (const c of [7, 3, 9, 1, 5]) f.push(c, 2);
    f.push(0, 4);
    const out: number[] = [];
    let v = f.pop();
    while (v !== undefined) {
      out.push(v);
      v = f.pop();
    }
    expect(out).toEqual([7, 3, 9, 1, 5, 0]);
  });

  test('cells lists entries in pop order', () => {
    const f = new PriorityFrontier();
    f.push(1, 3);
    f.push(2, 1);
    f.push(3, 1);
    expect([...f.cells()]).toEqual([2, 3, 1]);
  });
});
