// engine/src/search.ts
//
// DFS, BFS, Dijkstra and A* over a Maze, written as generators: each
// state-changing operation yields one StepEvent and the return value is the
// SearchOutcome. Nothing here sleeps or renders; callers decide how fast to
// pull events (one at a time for animation, all at once for batch runs).

import { MazeError } from './errors.js';
import { PriorityFrontier, QueueFrontier, StackFrontier } from './frontier.js';
import type { Frontier } from './frontier.js';
import { step } from './maze.js';
import type { Maze } from './maze.js';
import { DIRS, STRATEGY_LABELS } from './types.js';
import type {
  CellId,
  PathEvent,
  Point,
  SearchEvent,
  SearchOptions,
  SearchOutcome,
  SearchRun,
  SearchStats,
  StepEvent,
  StepKind,
  StrategyKey,
  UnreachableEvent
} from './types.js';

export type SearchGenerator = Generator<StepEvent, SearchOutcome, void>;

type Endpoints = { start: CellId; goal: CellId };

export function manhattan(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/** Walks `parent` back from `goal`; -1 marks the start. */
export function reconstructPath(parent: Int32Array, goal: CellId): CellId[] {
  const path: CellId[] = [];
  for (let cur = goal; cur !== -1; cur = parent[cur]) {
    path.push(cur);
    if (path.length > parent.length) throw new Error('parent chain contains a cycle');
  }
  return path.reverse();
}

/**
 * True when consecutive cells are joined by an open wall, no cell repeats,
 * and the ends match `start`/`goal` when those are given.
 */
export function isSimplePath(maze: Maze, path: readonly CellId[], start?: CellId, goal?: CellId): boolean {
  if (path.length === 0) return false;
  if (start !== undefined && path[0] !== start) return false;
  if (goal !== undefined && path[path.length - 1] !== goal) return false;

  const seen = new Set<CellId>();
  for (let i = 0; i < path.length; i++) {
    const id = path[i];
    if (id < 0 || id >= maze.cellCount || seen.has(id)) return false;
    seen.add(id);
    if (i === 0) continue;

    const prev = maze.pointOf(path[i - 1]);
    const linked = DIRS.some((d) => {
      const n = maze.neighbor(prev.x, prev.y, d);
      return n !== null && maze.cellId(n.x, n.y) === id && maze.canMove(prev.x, prev.y, d);
    });
    if (!linked) return false;
  }
  return true;
}

/** Every cell reachable from `from`; equals the whole grid for a perfect maze. */
export function reachableFrom(maze: Maze, from: Point): Set<CellId> {
  const start = resolveCell(maze, from, 'start');
  const seen = new Set<CellId>([start]);
  const queue = new QueueFrontier();
  queue.push(start);

  for (let u = queue.pop(); u !== undefined; u = queue.pop()) {
    for (const v of openNeighbors(maze, u)) {
      if (seen.has(v)) continue;
      seen.add(v);
      queue.push(v);
    }
  }
  return seen;
}

/**
 * Step-by-step search. Start/goal are validated before the generator is
 * created, so an InvalidCell error surfaces at call time.
 */
export function searchSteps(maze: Maze, options: SearchOptions): SearchGenerator {
  const ends = resolveEndpoints(maze, options);
  return runStrategy(maze, options.strategy, ends, true);
}

export function runSearch(maze: Maze, options: SearchOptions): SearchRun {
  const ends = resolveEndpoints(maze, options);
  const stepwise = (options.mode ?? 'batch') === 'stepwise';
  const gen = runStrategy(maze, options.strategy, ends, stepwise);

  const events: SearchEvent[] = [];
  let r = gen.next();
  while (!r.done) {
    if (stepwise) events.push(r.value);
    r = gen.next();
  }

  const outcome = r.value;
  if (stepwise) events.push(terminalEvent(maze, options.strategy, ends, outcome));
  return { ...outcome, events };
}

export function terminalEvent(
  maze: Maze,
  strategy: StrategyKey,
  ends: Endpoints,
  outcome: SearchOutcome
): PathEvent | UnreachableEvent {
  if (outcome.ok) return { type: 'path', cells: outcome.path };
  const label = STRATEGY_LABELS[strategy];
  return {
    type: 'unreachable',
    message: `${label} - goal ${fmt(maze, ends.goal)} unreachable from ${fmt(maze, ends.start)}`
  };
}

export function resolveEndpoints(maze: Maze, options: Pick<SearchOptions, 'start' | 'goal'>): Endpoints {
  return {
    start: resolveCell(maze, options.start ?? { x: 0, y: 0 }, 'start'),
    goal: resolveCell(maze, options.goal ?? { x: maze.width - 1, y: maze.height - 1 }, 'goal')
  };
}

function resolveCell(maze: Maze, p: Point, what: string): CellId {
  if (!maze.inBounds(p.x, p.y)) {
    throw new MazeError('InvalidCell', `${what} (${p.x},${p.y}) is outside the ${maze.width}x${maze.height} maze`);
  }
  return maze.cellId(p.x, p.y);
}

function runStrategy(maze: Maze, strategy: StrategyKey, ends: Endpoints, record: boolean): SearchGenerator {
  if (strategy === 'dfs') return depthFirst(maze, ends, record);
  if (strategy === 'bfs') return breadthFirst(maze, ends, record);
  if (strategy === 'dijkstra') return bestFirst(maze, ends, record, 'dijkstra', () => 0);

  const goal = maze.pointOf(ends.goal);
  return bestFirst(maze, ends, record, 'astar', (id) => manhattan(maze.pointOf(id), goal));
}

// ---------------- Shared run state ----------------

class SearchState {
  readonly visited = new Set<CellId>();
  readonly parent: Int32Array;
  expanded = 0;
  steps = 0;
  peakFrontier = 0;

  constructor(
    readonly maze: Maze,
    readonly frontier: Frontier,
    readonly label: string,
    private readonly record: boolean,
    // Priority frontiers keep stale entries for finalized cells; hide them.
    private readonly hideVisitedInFrontier = false
  ) {
    this.parent = new Int32Array(maze.cellCount).fill(-1);
  }

  push(cell: CellId, priority = 0): void {
    this.frontier.push(cell, priority);
    this.peakFrontier = Math.max(this.peakFrontier, this.frontier.size);
  }

  *emit(kind: StepKind, current: CellId, message: string): Generator<StepEvent, void, void> {
    this.steps++;
    if (!this.record) return;

    const frontier = this.frontier.cells();
    if (this.hideVisitedInFrontier) {
      for (const v of this.visited) frontier.delete(v);
    }
    yield {
      type: 'step',
      kind,
      current,
      frontier,
      visited: new Set(this.visited),
      message: `${this.label} - ${message}`
    };
  }

  at(id: CellId): string {
    return fmt(this.maze, id);
  }

  stats(): SearchStats {
    return { expanded: this.expanded, visited: this.visited.size, peakFrontier: this.peakFrontier, steps: this.steps };
  }

  found(goal: CellId): SearchOutcome {
    return { ok: true, path: reconstructPath(this.parent, goal), stats: this.stats() };
  }

  exhausted(): SearchOutcome {
    return { ok: false, reason: 'goal_unreachable', stats: this.stats() };
  }
}

function trivialOutcome(start: CellId): SearchOutcome {
  return { ok: true, path: [start], stats: { expanded: 0, visited: 1, peakFrontier: 0, steps: 0 } };
}

// Open neighbors of `id` in fixed N, E, S, W order.
function openNeighbors(maze: Maze, id: CellId): CellId[] {
  const { x, y } = maze.pointOf(id);
  const out: CellId[] = [];
  for (const d of DIRS) {
    if (!maze.canMove(x, y, d)) continue;
    const { nx, ny } = step(x, y, d);
    out.push(maze.cellId(nx, ny));
  }
  return out;
}

function fmt(maze: Maze, id: CellId): string {
  const p = maze.pointOf(id);
  return `(${p.x},${p.y})`;
}

// ---------------- Strategies ----------------

// The stack holds the single active path. Each step either advances into the
// first untried open direction of the top cell or pops it as a dead end.
function* depthFirst(maze: Maze, { start, goal }: Endpoints, record: boolean): SearchGenerator {
  if (start === goal) return trivialOutcome(start);

  const stack = new StackFrontier();
  const s = new SearchState(maze, stack, STRATEGY_LABELS.dfs, record);
  s.push(start);
  s.visited.add(start);

  for (let u = stack.peek(); u !== undefined; u = stack.peek()) {
    if (u === goal) return s.found(goal);

    const next = openNeighbors(maze, u).find((v) => !s.visited.has(v));
    if (next !== undefined) {
      s.parent[next] = u;
      s.visited.add(next);
      s.push(next);
      s.expanded++;
      yield* s.emit('advance', next, `advance from ${s.at(u)} to ${s.at(next)}`);
    } else {
      stack.pop();
      yield* s.emit('backtrack', u, `dead end at ${s.at(u)}, backtracking`);
    }
  }

  return s.exhausted();
}

// Cells are marked visited when enqueued, so each is discovered once and the
// first discovery lies on a shortest path.
function* breadthFirst(maze: Maze, { start, goal }: Endpoints, record: boolean): SearchGenerator {
  if (start === goal) return trivialOutcome(start);

  const queue = new QueueFrontier();
  const s = new SearchState(maze, queue, STRATEGY_LABELS.bfs, record);
  s.push(start);
  s.visited.add(start);

  for (let u = queue.pop(); u !== undefined; u = queue.pop()) {
    s.expanded++;
    yield* s.emit('expand', u, `expanding cell ${s.at(u)}`);
    if (u === goal) return s.found(goal);

    for (const v of openNeighbors(maze, u)) {
      if (s.visited.has(v)) continue;
      s.visited.add(v);
      s.parent[v] = u;
      s.push(v);
      yield* s.emit('enqueue', u, `enqueue ${s.at(v)}`);
    }
  }

  return s.exhausted();
}

// Dijkstra (h = 0) and A* (h = Manhattan distance to goal). Unit edge cost;
// a cell is visited once popped, later duplicates are skipped.
function* bestFirst(
  maze: Maze,
  { start, goal }: Endpoints,
  record: boolean,
  strategy: 'dijkstra' | 'astar',
  h: (id: CellId) => number
): SearchGenerator {
  if (start === goal) return trivialOutcome(start);

  const pq = new PriorityFrontier();
  const s = new SearchState(maze, pq, STRATEGY_LABELS[strategy], record, true);
  const dist = new Float64Array(maze.cellCount).fill(Infinity);
  dist[start] = 0;
  s.push(start, h(start));

  for (let u = pq.pop(); u !== undefined; u = pq.pop()) {
    if (s.visited.has(u)) continue;
    s.visited.add(u);
    s.expanded++;
    yield* s.emit('expand', u, `expanding cell ${s.at(u)}`);
    if (u === goal) return s.found(goal);

    for (const v of openNeighbors(maze, u)) {
      const alt = dist[u] + 1;
      if (alt >= dist[v]) continue;
      dist[v] = alt;
      s.parent[v] = u;
      s.push(v, alt + h(v));
      yield* s.emit('relax', u, `relax edge to ${s.at(v)}`);
    }
  }

  return s.exhausted();
}
