import { describe, expect, test } from 'vitest';
import { MazeError } from '../src/errors.js';
import { generateMaze } from '../src/generator.js';
import { mazeFromPassages } from '../src/maze.js';
import { XorShift32 } from '../src/prng.js';
import { isSimplePath, reconstructPath, runSearch, searchSteps } from '../src/search.js';
import { STRATEGIES } from '../src/types.js';
import type { Passage, SearchEvent, StepEvent } from '../src/types.js';

// 2x2, ids 0=(0,0) 1=(1,0) 2=(0,1) 3=(1,1); wall between (0,1) and (1,1).
//   0 - 1
//   |   |
//   2   3
const tree2x2 = () =>
  mazeFromPassages(2, 2, [
    { x: 0, y: 0, dir: 'E' },
    { x: 0, y: 0, dir: 'S' },
    { x: 1, y: 0, dir: 'S' }
  ]);

const corridor4x1 = () =>
  mazeFromPassages(4, 1, [
    { x: 0, y: 0, dir: 'E' },
    { x: 1, y: 0, dir: 'E' },
    { x: 2, y: 0, dir: 'E' }
  ]);

function stepsOf(events: readonly SearchEvent[]): StepEvent[] {
  return events.filter((e): e is StepEvent => e.type === 'step');
}

describe('breadth-first search', () => {
  test('emits expand/enqueue events and finds the path', () => {
    const r = runSearch(tree2x2(), { strategy: 'bfs', mode: 'stepwise' });

    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(r.path).toEqual([0, 1, 3]);
    expect(r.stats).toEqual({ expanded: 4, visited: 4, peakFrontier: 2, steps: 7 });
    expect(r.events).toHaveLength(8);

    const steps = stepsOf(r.events);
    expect(steps.map((e) => e.kind)).toEqual(['expand', 'enqueue', 'enqueue', 'expand', 'enqueue', 'expand', 'expand']);
    expect(steps.map((e) => e.message)).toEqual([
      'BFS - expanding cell (0,0)',
      'BFS - enqueue (1,0)',
      'BFS - enqueue (0,1)',
      'BFS - expanding cell (1,0)',
      'BFS - enqueue (1,1)',
      'BFS - expanding cell (0,1)',
      'BFS - expanding cell (1,1)'
    ]);

    expect(steps[0].current).toBe(0);
    expect([...steps[0].frontier]).toEqual([]);
    expect([...steps[1].frontier]).toEqual([1]);
    expect([...steps[1].visited]).toEqual([0, 1]);
    expect([...steps[2].frontier]).toEqual([1, 2]);
    expect([...steps[4].frontier]).toEqual([2, 3]);

    expect(r.events[7]).toEqual({ type: 'path', cells: [0, 1, 3] });
  });

  test('snapshots are not shared between events', () => {
    const r = runSearch(tree2x2(), { strategy: 'bfs', mode: 'stepwise' });
    const steps = stepsOf(r.events);
    expect(steps[0].visited.size).toBe(1);
    expect(steps[6].visited.size).toBe(4);
  });
});

describe('depth-first search', () => {
  test('advances along the first open direction', () => {
    const r = runSearch(tree2x2(), { strategy: 'dfs', mode: 'stepwise' });

    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(r.path).toEqual([0, 1, 3]);
    expect(r.stats).toEqual({ expanded: 2, visited: 3, peakFrontier: 3, steps: 2 });

    const steps = stepsOf(r.events);
    expect(steps.map((e) => e.current)).toEqual([1, 3]);
    expect([...steps[0].frontier]).toEqual([1, 0]);
    expect(steps[0].message).toBe('DFS - advance from (0,0) to (1,0)');
  });

  test('backtracks out of dead ends', () => {
    const r = runSearch(tree2x2(), { strategy: 'dfs', mode: 'stepwise', goal: { x: 0, y: 1 } });

    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(r.path).toEqual([0, 2]);

    const steps = stepsOf(r.events);
    expect(steps.map((e) => e.kind)).toEqual(['advance', 'advance', 'backtrack', 'backtrack', 'advance']);
    expect(steps[2].message).toBe('DFS - dead end at (1,1), backtracking');
    expect(steps[3].message).toBe('DFS - dead end at (1,0), backtracking');
    expect(steps[4].message).toBe('DFS - advance from (0,0) to (0,1)');
  });
});

describe('best-first search', () => {
  test('dijkstra expands and relaxes in key order', () => {
    const r = runSearch(tree2x2(), { strategy: 'dijkstra', mode: 'stepwise' });
    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(r.path).toEqual([0, 1, 3]);
    expect(stepsOf(r.events).map((e) => e.message)).toEqual([
      'Dijkstra - expanding cell (0,0)',
      'Dijkstra - relax edge to (1,0)',
      'Dijkstra - relax edge to (0,1)',
      'Dijkstra - expanding cell (1,0)',
      'Dijkstra - relax edge to (1,1)',
      'Dijkstra - expanding cell (0,1)',
      'Dijkstra - expanding cell (1,1)'
    ]);
    expect(r.stats.visited).toBe(4);
  });

  test('A* breaks equal keys first in, first out', () => {
    const r = runSearch(tree2x2(), { strategy: 'astar', mode: 'stepwise' });
    expect(stepsOf(r.events).map((e) => e.kind)).toEqual([
      'expand',
      'relax',
      'relax',
      'expand',
      'relax',
      'expand',
      'expand'
    ]);
    expect(r.stats.visited).toBe(4);
  });

  test('A* visits fewer cells than dijkstra in a corridor', () => {
    const start = { x: 1, y: 0 };
    const goal = { x: 3, y: 0 };
    const d = runSearch(corridor4x1(), { strategy: 'dijkstra', start, goal });
    const a = runSearch(corridor4x1(), { strategy: 'astar', start, goal });

    expect(d.stats.visited).toBe(4);
    expect(a.stats.visited).toBe(3);
    expect(d.ok && d.path).toEqual([1, 2, 3]);
    expect(a.ok && a.path).toEqual([1, 2, 3]);
  });
});

describe('unreachable goal', () => {
  const walled = () => mazeFromPassages(2, 1, []);

  test('BFS ends with an unreachable event', () => {
    const r = runSearch(walled(), { strategy: 'bfs', mode: 'stepwise' });
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.reason).toBe('goal_unreachable');
    expect(r.events).toHaveLength(2);
    expect(r.events[1]).toEqual({ type: 'unreachable', message: 'BFS - goal (1,0) unreachable from (0,0)' });
  });

  test('DFS backtracks out of the start cell', () => {
    const r = runSearch(walled(), { strategy: 'dfs', mode: 'stepwise' });
    expect(r.ok).toBe(false);
    expect(r.stats).toEqual({ expanded: 0, visited: 1, peakFrontier: 1, steps: 1 });
    const steps = stepsOf(r.events);
    expect(steps.map((e) => e.message)).toEqual(['DFS - dead end at (0,0), backtracking']);
    expect(r.events[1]).toEqual({ type: 'unreachable', message: 'DFS - goal (1,0) unreachable from (0,0)' });
  });

  test.each([
    ['dijkstra', 'Dijkstra'],
    ['astar', 'A*']
  ] as const)('%s exhausts the heap and reports the goal', (strategy, label) => {
    const r = runSearch(walled(), { strategy, mode: 'stepwise' });
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.reason).toBe('goal_unreachable');
    expect(r.stats).toEqual({ expanded: 1, visited: 1, peakFrontier: 1, steps: 1 });
    expect(r.events.map((e) => e.type)).toEqual(['step', 'unreachable']);
    expect(r.events[1]).toEqual({ type: 'unreachable', message: `${label} - goal (1,0) unreachable from (0,0)` });
  });
});

describe('run modes', () => {
  test('batch runs carry no events but the same outcome', () => {
    const maze = generateMaze(9, 6, 31337);
    for (const strategy of STRATEGIES) {
      const batch = runSearch(maze, { strategy });
      const stepwise = runSearch(maze, { strategy, mode: 'stepwise' });
      expect(batch.events).toEqual([]);
      expect(batch.stats).toEqual(stepwise.stats);
      expect(batch.ok && batch.path).toEqual(stepwise.ok && stepwise.path);
      expect(stepsOf(stepwise.events)).toHaveLength(stepwise.stats.steps);
    }
  });

  test('searchSteps returns the outcome when drained', () => {
    const gen = searchSteps(tree2x2(), { strategy: 'bfs' });
    let n = 0;
    let r = gen.next();
    while (!r.done) {
      n++;
      r = gen.next();
    }
    expect(n).toBe(7);
    expect(r.value.ok && r.value.path).toEqual([0, 1, 3]);
  });

  test('start equal to goal yields only the path', () => {
    const maze = generateMaze(3, 3, 4);
    for (const strategy of STRATEGIES) {
      const r = runSearch(maze, { strategy, mode: 'stepwise', start: { x: 1, y: 1 }, goal: { x: 1, y: 1 } });
      expect(r.events).toEqual([{ type: 'path', cells: [4] }]);
      expect(r.stats).toEqual({ expanded: 0, visited: 1, peakFrontier: 0, steps: 0 });
    }
  });

  test('a 1x1 maze is solved immediately', () => {
    const maze = generateMaze(1, 1, 8);
    for (const strategy of STRATEGIES) {
      const r = runSearch(maze, { strategy });
      expect(r.ok && r.path).toEqual([0]);
      expect(r.stats.expanded).toBe(0);
    }
  });

  test('endpoints outside the grid throw before searching', () => {
    const maze = mazeFromPassages(2, 1, [{ x: 0, y: 0, dir: 'E' }]);
    expect(() => searchSteps(maze, { strategy: 'bfs', goal: { x: 5, y: 0 } })).toThrow(
      'goal (5,0) is outside the 2x1 maze'
    );
    expect(() => runSearch(maze, { strategy: 'dfs', start: { x: -1, y: 0 } })).toThrow(MazeError);
  });
});

describe('generated mazes', () => {
  const cases: Array<[number, number, number]> = [
    [5, 5, 1],
    [5, 5, 2],
    [12, 7, 3],
    [1, 9, 4],
    [9, 1, 5],
    [30, 15, 6]
  ];

  test.each(cases)('%ix%i seed %i: every strategy finds the unique path', (w, h, seed) => {
    const maze = generateMaze(w, h, seed);
    const start = 0;
    const goal = maze.cellCount - 1;

    const lengths = STRATEGIES.map((strategy) => {
      const r = runSearch(maze, { strategy });
      expect(r.ok).toBe(true);
      if (!r.ok) return -1;
      expect(isSimplePath(maze, r.path, start, goal)).toBe(true);
      return r.path.length;
    });
    expect(new Set(lengths).size).toBe(1);

    const d = runSearch(maze, { strategy: 'dijkstra' });
    const a = runSearch(maze, { strategy: 'astar' });
    expect(a.stats.visited).toBeLessThanOrEqual(d.stats.visited);
  });
});

describe('mazes with loops', () => {
  test('shortest-path strategies agree and DFS is never shorter', () => {
    const rng = new XorShift32(2718);
    for (let round = 0; round < 40; round++) {
      const w = rng.int(2, 10);
      const h = rng.int(2, 10);
      const extra: Passage[] = [];
      for (let i = 0; i < w + h; i++) {
        const x = rng.int(0, w - 1);
        const y = rng.int(0, h - 1);
        extra.push({ x, y, dir: rng.int(0, 2) === 0 ? 'E' : 'S' });
      }
      const maze = mazeFromPassages(w, h, [...generateMaze(w, h, round).passages(), ...extra]);
      const start = { x: rng.int(0, w), y: rng.int(0, h) };
      const goal = { x: rng.int(0, w), y: rng.int(0, h) };
      const from = maze.cellId(start.x, start.y);
      const to = maze.cellId(goal.x, goal.y);

      const runs = STRATEGIES.map((strategy) => runSearch(maze, { strategy, start, goal, mode: 'stepwise' }));
      const lengths = runs.map((r) => {
        expect(r.ok).toBe(true);
        expect(r.events).toHaveLength(r.stats.steps + 1);
        if (!r.ok) return -1;
        expect(isSimplePath(maze, r.path, from, to)).toBe(true);
        return r.path.length;
      });

      const [dfs, bfs, dijkstra, astar] = lengths;
      expect(dijkstra).toBe(bfs);
      expect(astar).toBe(bfs);
      expect(dfs).toBeGreaterThanOrEqual(bfs);
      expect(runs[3].stats.visited).toBeLessThanOrEqual(runs[2].stats.visited);
    }
  });
});

describe('path helpers', () => {
  test('reconstructPath follows parents back to the start', () => {
    const parent = Int32Array.from([-1, 0, 1, 2]);
    expect(reconstructPath(parent, 3)).toEqual([0, 1, 2, 3]);
  });

  test('reconstructPath rejects a cyclic chain', () => {
    const parent = Int32Array.from([1, 0]);
    expect(() => reconstructPath(parent, 0)).toThrow('parent chain contains a cycle');
  });

  test('isSimplePath rejects walls and repeats', () => {
    const maze = tree2x2();
    expect(isSimplePath(maze, [0, 1, 3])).toBe(true);
    expect(isSimplePath(maze, [2, 3])).toBe(false);
    expect(isSimplePath(maze, [0, 1, 0])).toBe(false);
    expect(isSimplePath(maze, [])).toBe(false);
    expect(isSimplePath(maze, [0, 2], 0, 3)).toBe(false);
  });
});
