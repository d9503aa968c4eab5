// server/src/http.ts

import express from 'express';
import type { Express } from 'express';
import { generateMaze, isMazeError, renderFrame, runSearch } from '@maze-lab/engine';
import { CONFIG } from './config.js';
import { parseSolveRequest } from './protocol.js';

export interface HttpReply {
  status: number;
  body: unknown;
}

function intParam(v: unknown): number | undefined {
  if (typeof v !== 'string' || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isInteger(n) ? n : Number.NaN;
}

/** GET /api/maze?width&height&seed */
export function describeMaze(query: Record<string, unknown>, maxSize: number = CONFIG.maxMazeSize): HttpReply {
  const width = intParam(query.width) ?? CONFIG.mazeWidth;
  const height = intParam(query.height) ?? CONFIG.mazeHeight;
  const seed = intParam(query.seed);

  if (Number.isNaN(seed)) return { status: 400, body: { error: 'seed must be an integer' } };
  if (width > maxSize || height > maxSize) return { status: 400, body: { error: `max maze size is ${maxSize}` } };

  try {
    const maze = generateMaze(width, height, seed ?? CONFIG.mazeSeed ?? undefined);
    return {
      status: 200,
      body: {
        width: maze.width,
        height: maze.height,
        seed: maze.seed,
        fingerprint: maze.fingerprint(),
        ...maze.edges(),
        rows: renderFrame(maze)
      }
    };
  } catch (e: unknown) {
    if (isMazeError(e)) return { status: 400, body: { error: e.message, code: e.code } };
    throw e;
  }
}

/** POST /api/solve: one batch run over a seeded maze. */
export function solve(body: unknown, maxSize: number = CONFIG.maxMazeSize): HttpReply {
  const parsed = parseSolveRequest(body, { maxSize });
  if (!parsed.ok) return { status: 400, body: { error: parsed.err } };
  const req = parsed.msg;

  try {
    const maze = generateMaze(req.width, req.height, req.seed);
    const r = runSearch(maze, { strategy: req.strategy, start: req.start, goal: req.goal, mode: 'batch' });
    if (!r.ok) {
      return { status: 422, body: { ok: false, reason: r.reason, stats: r.stats } };
    }
    return {
      status: 200,
      body: { ok: true, strategy: req.strategy, path: r.path, stats: r.stats, rows: renderFrame(maze, { path: r.path }) }
    };
  } catch (e: unknown) {
    if (isMazeError(e)) return { status: 400, body: { error: e.message, code: e.code } };
    throw e;
  }
}

export function createApp(): Express {
  const app = express();
  app.use(express.json({ limit: '64kb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/maze', (req, res) => {
    const r = describeMaze(req.query);
    res.status(r.status).json(r.body);
  });

  app.post('/api/solve', (req, res) => {
    const r = solve(req.body);
    if (r.status !== 200) console.log(`[http] solve -> ${r.status}`);
    res.status(r.status).json(r.body);
  });

  return app;
}
