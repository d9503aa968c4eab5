// server/src/connection.ts
//
// Socket-independent handler for one client: parses messages, drives the
// session state machine and paces animated runs. ws.ts only wires a
// WebSocket to send()/handle()/close().

import { frameFromEvent, renderFrame } from '@maze-lab/engine';
import type { Maze, StepEvent, StrategyKey } from '@maze-lab/engine';
import { CONFIG, delayForSpeed } from './config.js';
import { Pacer } from './pacer.js';
import { safeParseClient } from './protocol.js';
import type { ClientMsg, ServerMsg, WireStep } from './protocol.js';
import { MazeSession } from './session.js';
import type { RunSummary } from './session.js';

export interface ConnectionOptions {
  maxSize: number;
  defaultWidth: number;
  defaultHeight: number;
  defaultSeed: number | null;
  defaultSpeed: number;
  speedDelaysMs: readonly number[];
}

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  maxSize: CONFIG.maxMazeSize,
  defaultWidth: CONFIG.mazeWidth,
  defaultHeight: CONFIG.mazeHeight,
  defaultSeed: CONFIG.mazeSeed,
  defaultSpeed: CONFIG.defaultSpeed,
  speedDelaysMs: CONFIG.speedDelaysMs
};

export class Connection {
  readonly session = new MazeSession();
  private readonly pacer: Pacer;
  private lastSeq = -1;

  constructor(
    private readonly send: (msg: ServerMsg) => void,
    private readonly opts: ConnectionOptions = DEFAULT_CONNECTION_OPTIONS
  ) {
    this.pacer = new Pacer(() => this.advance());
  }

  handle(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.send({ type: 'error', payload: { code: 'bad_json', message: 'invalid json' } });
      return;
    }

    const parsed = safeParseClient(json, { maxSize: this.opts.maxSize });
    if (!parsed.ok) {
      this.send({ type: 'error', payload: { code: 'bad_schema', message: parsed.err } });
      return;
    }

    const msg = parsed.msg;
    if (msg.seq <= this.lastSeq) {
      this.send({ type: 'error', payload: { code: 'bad_seq', message: 'seq must increase', seq: msg.seq } });
      return;
    }
    this.lastSeq = msg.seq;

    if (this.session.stateName === 'closed') {
      this.reject(msg.seq, 'session closed');
      return;
    }

    this.dispatch(msg);
  }

  close(): void {
    this.pacer.stop();
    this.session.quit();
  }

  private dispatch(msg: ClientMsg): void {
    switch (msg.type) {
      case 'generate': {
        const r = this.session.generate({
          width: msg.payload.width ?? this.opts.defaultWidth,
          height: msg.payload.height ?? this.opts.defaultHeight,
          seed: msg.payload.seed ?? this.opts.defaultSeed ?? undefined
        });
        if (!r.ok) return this.reject(msg.seq, r.reason);
        this.ack(msg.seq);
        this.sendMaze(r.value);
        this.sendSession();
        return;
      }

      case 'run': {
        const p = msg.payload;
        const r = this.session.run({
          strategy: p.strategy,
          delayMs: delayForSpeed(p.speed ?? this.opts.defaultSpeed, this.opts.speedDelaysMs),
          skipAnimation: p.skip_animation,
          manual: p.manual,
          start: p.start,
          goal: p.goal
        });
        if (!r.ok) return this.reject(msg.seq, r.reason);
        this.ack(msg.seq);

        const started = r.value;
        if (started.mode === 'batch') {
          this.sendFinal(started.summary);
          this.sendSession();
          return;
        }
        this.sendSession();
        if (!started.run.manual) this.pacer.start(started.run.delayMs);
        return;
      }

      case 'step': {
        const s = this.session.state;
        if (s.name !== 'animating') return this.reject(msg.seq, `cannot step while ${s.name}`);
        if (!s.run.manual) return this.reject(msg.seq, 'run is auto-paced');
        this.ack(msg.seq);
        this.advance();
        return;
      }

      case 'next': {
        const r = this.session.next(msg.payload.choice);
        if (!r.ok) return this.reject(msg.seq, r.reason);
        this.ack(msg.seq);
        this.sendSession();
        return;
      }

      case 'quit': {
        this.pacer.stop();
        this.session.quit();
        this.ack(msg.seq);
        this.sendSession();
        return;
      }
    }
  }

  /** Emits one frame; returns false once the run has ended. */
  private advance(): boolean {
    const s = this.session.state;
    if (s.name !== 'animating') return false;
    const maze = s.maze;
    const strategy = s.run.strategy;

    const r = this.session.step();
    if (!r.ok) {
      console.warn(`[session] step rejected: ${r.reason}`);
      return false;
    }

    const adv = r.value;
    if (!adv.done) {
      this.sendFrame(maze, strategy, adv.index, adv.event);
      return true;
    }

    this.sendFinal(adv.summary);
    this.sendSession();
    return false;
  }

  private sendMaze(maze: Maze): void {
    const { east, south } = maze.edges();
    this.send({
      type: 'maze',
      payload: { width: maze.width, height: maze.height, seed: maze.seed, east, south, rows: renderFrame(maze) }
    });
  }

  private sendFrame(maze: Maze, strategy: StrategyKey, index: number, ev: StepEvent): void {
    const frame = frameFromEvent(maze, ev);
    this.send({
      type: 'frame',
      payload: { strategy, index, step: toWireStep(ev), status: frame.status, rows: frame.rows }
    });
  }

  private sendFinal(summary: RunSummary): void {
    const s = this.session.state;
    if (s.name !== 'awaiting_next_step') return;
    const frame = frameFromEvent(s.maze, summary.final);

    if (summary.final.type === 'path') {
      this.send({
        type: 'path',
        payload: {
          strategy: summary.strategy,
          cells: [...summary.final.cells],
          stats: summary.stats,
          status: frame.status,
          rows: frame.rows
        }
      });
      return;
    }

    console.warn(`[session] ${summary.final.message}`);
    this.send({
      type: 'unreachable',
      payload: { strategy: summary.strategy, message: summary.final.message, stats: summary.stats, rows: frame.rows }
    });
  }

  private sendSession(): void {
    this.send({ type: 'session', payload: { state: this.session.stateName } });
  }

  private ack(seq: number): void {
    this.send({ type: 'action_result', payload: { ok: true, seq } });
  }

  private reject(seq: number, reason: string): void {
    this.send({ type: 'action_result', payload: { ok: false, reason, seq } });
  }
}

export function toWireStep(ev: StepEvent): WireStep {
  return {
    kind: ev.kind,
    current: ev.current,
    frontier: [...ev.frontier],
    visited: [...ev.visited],
    message: ev.message
  };
}
