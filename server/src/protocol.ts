// server/src/protocol.ts
import { STRATEGIES } from '@maze-lab/engine';
import type { Point, SearchStats, StepKind, StrategyKey } from '@maze-lab/engine';
import type { SessionStateName } from './session.js';

export interface RunPayload {
  strategy: StrategyKey;
  speed?: number;
  skip_animation?: boolean;
  manual?: boolean;
  start?: Point;
  goal?: Point;
}

export interface GeneratePayload {
  width?: number;
  height?: number;
  seed?: number;
}

export type ClientMsg =
  | { seq: number; type: 'generate'; payload: GeneratePayload }
  | { seq: number; type: 'run'; payload: RunPayload }
  | { seq: number; type: 'step'; payload: Record<string, never> }
  | { seq: number; type: 'next'; payload: { choice: 'same' | 'new' } }
  | { seq: number; type: 'quit'; payload: Record<string, never> };

export interface WireStep {
  kind: StepKind;
  current: number;
  frontier: number[];
  visited: number[];
  message: string;
}

export type ServerMsg =
  | { type: 'session'; payload: { state: SessionStateName } }
  | {
      type: 'maze';
      payload: { width: number; height: number; seed: number | null; east: number[]; south: number[]; rows: string[] };
    }
  | { type: 'frame'; payload: { strategy: StrategyKey; index: number; step: WireStep; status: string; rows: string[] } }
  | {
      type: 'path';
      payload: { strategy: StrategyKey; cells: number[]; stats: SearchStats; status: string; rows: string[] };
    }
  | { type: 'unreachable'; payload: { strategy: StrategyKey; message: string; stats: SearchStats; rows: string[] } }
  | { type: 'action_result'; payload: { ok: boolean; reason?: string; seq: number } }
  | { type: 'error'; payload: { code: string; message: string; seq?: number } };

export interface SolveRequest {
  width: number;
  height: number;
  seed: number;
  strategy: StrategyKey;
  start?: Point;
  goal?: Point;
}

export type Parsed<T> = { ok: true; msg: T } | { ok: false; err: string };

export const MAX_SPEED = 10;

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function isInt(v: unknown): v is number {
  return typeof v === 'number' && Number.isInteger(v);
}

export function isStrategy(v: unknown): v is StrategyKey {
  return typeof v === 'string' && STRATEGIES.some((s) => s === v);
}

function parsePoint(v: unknown, what: string): Parsed<Point | undefined> {
  if (v === undefined) return { ok: true, msg: undefined };
  if (!isRecord(v) || !isInt(v.x) || !isInt(v.y)) return { ok: false, err: `${what} must be {x, y} integers` };
  return { ok: true, msg: { x: v.x, y: v.y } };
}

function parseSize(v: unknown, what: string, maxSize: number): Parsed<number | undefined> {
  if (v === undefined) return { ok: true, msg: undefined };
  if (!isInt(v) || v < 1 || v > maxSize) return { ok: false, err: `${what} must be an integer in 1..${maxSize}` };
  return { ok: true, msg: v };
}

function parseOptionalBool(v: unknown, what: string): Parsed<boolean | undefined> {
  if (v === undefined || typeof v === 'boolean') return { ok: true, msg: v };
  return { ok: false, err: `${what} must be a boolean` };
}

export function safeParseClient(input: unknown, opts: { maxSize: number }): Parsed<ClientMsg> {
  if (!isRecord(input)) return { ok: false, err: 'message must be an object' };
  if (typeof input.seq !== 'number' || !Number.isFinite(input.seq)) return { ok: false, err: 'seq must be a number' };
  if (typeof input.type !== 'string') return { ok: false, err: 'type must be a string' };

  const seq = input.seq;
  const type = input.type;
  const payload = input.payload ?? {};
  if (!isRecord(payload)) return { ok: false, err: 'payload must be an object' };

  if (type === 'generate') {
    const width = parseSize(payload.width, 'generate.width', opts.maxSize);
    if (!width.ok) return width;
    const height = parseSize(payload.height, 'generate.height', opts.maxSize);
    if (!height.ok) return height;
    const seed = payload.seed;
    if (seed !== undefined && !isInt(seed)) return { ok: false, err: 'generate.seed must be an integer' };
    return { ok: true, msg: { seq, type, payload: { width: width.msg, height: height.msg, seed } } };
  }

  if (type === 'run') {
    if (!isStrategy(payload.strategy)) return { ok: false, err: `run.strategy must be one of ${STRATEGIES.join('/')}` };
    const speed = payload.speed;
    if (speed !== undefined && (!isInt(speed) || speed < 1 || speed > MAX_SPEED)) {
      return { ok: false, err: `run.speed must be an integer in 1..${MAX_SPEED}` };
    }
    const skip = parseOptionalBool(payload.skip_animation, 'run.skip_animation');
    if (!skip.ok) return skip;
    const manual = parseOptionalBool(payload.manual, 'run.manual');
    if (!manual.ok) return manual;
    const start = parsePoint(payload.start, 'run.start');
    if (!start.ok) return start;
    const goal = parsePoint(payload.goal, 'run.goal');
    if (!goal.ok) return goal;

    return {
      ok: true,
      msg: {
        seq,
        type,
        payload: {
          strategy: payload.strategy,
          speed,
          skip_animation: skip.msg,
          manual: manual.msg,
          start: start.msg,
          goal: goal.msg
        }
      }
    };
  }

  if (type === 'next') {
    const c = payload.choice;
    if (c !== 'same' && c !== 'new') return { ok: false, err: 'next.choice must be same/new' };
    return { ok: true, msg: { seq, type, payload: { choice: c } } };
  }

  if (type === 'step') return { ok: true, msg: { seq, type, payload: {} } };
  if (type === 'quit') return { ok: true, msg: { seq, type, payload: {} } };

  return { ok: false, err: `unknown type: ${type}` };
}

export function parseSolveRequest(input: unknown, opts: { maxSize: number }): Parsed<SolveRequest> {
  if (!isRecord(input)) return { ok: false, err: 'body must be an object' };

  const width = parseSize(input.width, 'width', opts.maxSize);
  if (!width.ok) return width;
  const height = parseSize(input.height, 'height', opts.maxSize);
  if (!height.ok) return height;
  if (width.msg === undefined || height.msg === undefined) return { ok: false, err: 'width and height are required' };
  if (!isInt(input.seed)) return { ok: false, err: 'seed must be an integer' };
  if (!isStrategy(input.strategy)) return { ok: false, err: `strategy must be one of ${STRATEGIES.join('/')}` };

  const start = parsePoint(input.start, 'start');
  if (!start.ok) return start;
  const goal = parsePoint(input.goal, 'goal');
  if (!goal.ok) return goal;

  return {
    ok: true,
    msg: {
      width: width.msg,
      height: height.msg,
      seed: input.seed,
      strategy: input.strategy,
      start: start.msg,
      goal: goal.msg
    }
  };
}
