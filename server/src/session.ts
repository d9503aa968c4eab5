// server/src/session.ts
//
// One user's generate -> choose -> animate -> next-step loop as an explicit
// state machine. Illegal transitions come back as { ok: false, reason }.
// Timing lives in the pacer; this class only advances when told to.

import {
  generateMaze,
  isMazeError,
  resolveEndpoints,
  runSearch,
  searchSteps,
  terminalEvent
} from '@maze-lab/engine';
import type {
  Maze,
  PathEvent,
  Point,
  SearchGenerator,
  SearchStats,
  StepEvent,
  StrategyKey,
  UnreachableEvent
} from '@maze-lab/engine';

export type SessionStateName = 'generating_maze' | 'choosing_strategy' | 'animating' | 'awaiting_next_step' | 'closed';

export interface ActiveRun {
  strategy: StrategyKey;
  gen: SearchGenerator;
  start: number;
  goal: number;
  manual: boolean;
  delayMs: number;
  stepIndex: number;
}

export interface RunSummary {
  strategy: StrategyKey;
  final: PathEvent | UnreachableEvent;
  stats: SearchStats;
}

export type SessionState =
  | { name: 'generating_maze' }
  | { name: 'choosing_strategy'; maze: Maze }
  | { name: 'animating'; maze: Maze; run: ActiveRun }
  | { name: 'awaiting_next_step'; maze: Maze; last: RunSummary }
  | { name: 'closed' };

export type Result<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface GenerateRequest {
  width: number;
  height: number;
  seed?: number;
}

export interface RunRequest {
  strategy: StrategyKey;
  delayMs: number;
  skipAnimation?: boolean;
  manual?: boolean;
  start?: Point;
  goal?: Point;
}

export type RunStarted = { mode: 'animating'; run: ActiveRun } | { mode: 'batch'; summary: RunSummary };

export type Advance =
  | { done: false; index: number; event: StepEvent }
  | { done: true; summary: RunSummary };

export class MazeSession {
  private s: SessionState = { name: 'generating_maze' };

  get state(): SessionState {
    return this.s;
  }

  get stateName(): SessionStateName {
    return this.s.name;
  }

  generate(req: GenerateRequest): Result<Maze> {
    if (this.s.name === 'animating' || this.s.name === 'closed') {
      return { ok: false, reason: `cannot generate while ${this.s.name}` };
    }
    try {
      const maze = generateMaze(req.width, req.height, req.seed);
      this.s = { name: 'choosing_strategy', maze };
      return { ok: true, value: maze };
    } catch (e: unknown) {
      if (isMazeError(e)) return { ok: false, reason: e.message };
      throw e;
    }
  }

  run(req: RunRequest): Result<RunStarted> {
    if (this.s.name !== 'choosing_strategy') {
      return { ok: false, reason: `cannot run while ${this.s.name}` };
    }
    const maze = this.s.maze;

    try {
      const ends = resolveEndpoints(maze, req);

      if (req.skipAnimation) {
        const r = runSearch(maze, { strategy: req.strategy, start: req.start, goal: req.goal, mode: 'batch' });
        const final = terminalEvent(maze, req.strategy, ends, r);
        const summary: RunSummary = { strategy: req.strategy, final, stats: r.stats };
        this.s = { name: 'awaiting_next_step', maze, last: summary };
        return { ok: true, value: { mode: 'batch', summary } };
      }

      const run: ActiveRun = {
        strategy: req.strategy,
        gen: searchSteps(maze, { strategy: req.strategy, start: req.start, goal: req.goal }),
        start: ends.start,
        goal: ends.goal,
        manual: req.manual ?? false,
        delayMs: req.delayMs,
        stepIndex: 0
      };
      this.s = { name: 'animating', maze, run };
      return { ok: true, value: { mode: 'animating', run } };
    } catch (e: unknown) {
      if (isMazeError(e)) return { ok: false, reason: e.message };
      throw e;
    }
  }

  /** Pulls the next event of the active run; the last pull ends the animation. */
  step(): Result<Advance> {
    if (this.s.name !== 'animating') {
      return { ok: false, reason: `cannot step while ${this.s.name}` };
    }
    const { maze, run } = this.s;
    const r = run.gen.next();

    if (!r.done) {
      run.stepIndex++;
      return { ok: true, value: { done: false, index: run.stepIndex, event: r.value } };
    }

    const final = terminalEvent(maze, run.strategy, { start: run.start, goal: run.goal }, r.value);
    const summary: RunSummary = { strategy: run.strategy, final, stats: r.value.stats };
    this.s = { name: 'awaiting_next_step', maze, last: summary };
    return { ok: true, value: { done: true, summary } };
  }

  next(choice: 'same' | 'new'): Result<SessionStateName> {
    if (this.s.name !== 'awaiting_next_step') {
      return { ok: false, reason: `cannot choose next step while ${this.s.name}` };
    }
    this.s = choice === 'same' ? { name: 'choosing_strategy', maze: this.s.maze } : { name: 'generating_maze' };
    return { ok: true, value: this.s.name };
  }

  quit(): void {
    this.s = { name: 'closed' };
  }
}
