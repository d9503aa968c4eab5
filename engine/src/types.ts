// engine/src/types.ts

// Fixed movement order: up, right, down, left.
export type Dir = 'N' | 'E' | 'S' | 'W';

export const DIRS: readonly Dir[] = ['N', 'E', 'S', 'W'];

/** Linear cell index: `y * width + x`. */
export type CellId = number;

export interface Point {
  x: number;
  y: number;
}

// A removed wall, expressed from the cell on its left/top side.
export interface Passage {
  x: number;
  y: number;
  dir: 'E' | 'S';
}

export interface RandomSource {
  int(minInclusive: number, maxExclusive: number): number;
}

export type StrategyKey = 'dfs' | 'bfs' | 'dijkstra' | 'astar';

export const STRATEGIES: readonly StrategyKey[] = ['dfs', 'bfs', 'dijkstra', 'astar'];

export const STRATEGY_LABELS: Record<StrategyKey, string> = {
  dfs: 'DFS',
  bfs: 'BFS',
  dijkstra: 'Dijkstra',
  astar: 'A*'
};

export type RunMode = 'stepwise' | 'batch';

export type StepKind = 'expand' | 'advance' | 'enqueue' | 'relax' | 'backtrack';

export interface StepEvent {
  type: 'step';
  kind: StepKind;
  current: CellId;
  frontier: ReadonlySet<CellId>;
  visited: ReadonlySet<CellId>;
  message: string;
}

export interface PathEvent {
  type: 'path';
  cells: readonly CellId[];
}

export interface UnreachableEvent {
  type: 'unreachable';
  message: string;
}

export type SearchEvent = StepEvent | PathEvent | UnreachableEvent;

export interface SearchStats {
  // Cells taken off the frontier and expanded (DFS: forward advances)
  expanded: number;
  visited: number;
  peakFrontier: number;
  steps: number;
}

export type SearchOutcome =
  | { ok: true; path: CellId[]; stats: SearchStats }
  | { ok: false; reason: 'goal_unreachable'; stats: SearchStats };

export interface SearchOptions {
  strategy: StrategyKey;
  start?: Point;
  goal?: Point;
  mode?: RunMode;
}

export type SearchRun = SearchOutcome & { events: SearchEvent[] };
