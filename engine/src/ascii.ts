// engine/src/ascii.ts
//
// Text frames: a W x H maze becomes (2H+1) rows of (2W+1) chars. Odd/odd
// positions are cells, the rest are corners and walls. The entrance is cut
// left of (0,0) and the exit right of (W-1,H-1).

import type { Maze } from './maze.js';
import type { CellId, SearchEvent } from './types.js';

export const GLYPH = {
  corner: '+',
  horiz: '-',
  vert: '|',
  visited: '.',
  frontier: 'o',
  current: '@',
  path: '*'
} as const;

export const FRAME_LEGEND: ReadonlyArray<{ glyph: string; meaning: string }> = [
  { glyph: GLYPH.corner, meaning: 'corner of wall' },
  { glyph: GLYPH.horiz, meaning: 'horizontal wall' },
  { glyph: GLYPH.vert, meaning: 'vertical wall' },
  { glyph: GLYPH.visited, meaning: 'visited cell' },
  { glyph: GLYPH.frontier, meaning: 'frontier' },
  { glyph: GLYPH.current, meaning: 'current cell' },
  { glyph: GLYPH.path, meaning: 'final path' }
];

export interface FrameOverlay {
  visited?: Iterable<CellId>;
  frontier?: Iterable<CellId>;
  current?: CellId | null;
  path?: Iterable<CellId>;
}

export interface Frame {
  status: string;
  rows: string[];
}

export function renderFrame(maze: Maze, overlay: FrameOverlay = {}): string[] {
  const grid = baseGrid(maze);

  const mark = (cells: Iterable<CellId> | undefined, ch: string) => {
    if (!cells) return;
    for (const id of cells) {
      const { x, y } = maze.pointOf(id);
      grid[2 * y + 1][2 * x + 1] = ch;
    }
  };

  mark(overlay.visited, GLYPH.visited);
  mark(overlay.frontier, GLYPH.frontier);
  if (overlay.current !== undefined && overlay.current !== null) mark([overlay.current], GLYPH.current);
  mark(overlay.path, GLYPH.path);

  return grid.map((row) => row.join(''));
}

export function frameFromEvent(maze: Maze, ev: SearchEvent): Frame {
  if (ev.type === 'step') {
    return {
      status: ev.message,
      rows: renderFrame(maze, { visited: ev.visited, frontier: ev.frontier, current: ev.current })
    };
  }
  if (ev.type === 'path') {
    return { status: 'FINAL (exit found) - displaying path', rows: renderFrame(maze, { path: ev.cells }) };
  }
  return { status: ev.message, rows: renderFrame(maze) };
}

function baseGrid(maze: Maze): string[][] {
  const rows = 2 * maze.height + 1;
  const cols = 2 * maze.width + 1;
  const grid: string[][] = [];

  for (let r = 0; r < rows; r++) {
    const row: string[] = [];
    for (let c = 0; c < cols; c++) {
      if (r % 2 === 0 && c % 2 === 0) row.push(GLYPH.corner);
      else if (r % 2 === 0) row.push(GLYPH.horiz);
      else if (c % 2 === 0) row.push(GLYPH.vert);
      else row.push(' ');
    }
    grid.push(row);
  }

  for (let y = 0; y < maze.height; y++) {
    for (let x = 0; x < maze.width; x++) {
      const dr = 2 * y + 1;
      const dc = 2 * x + 1;
      if (x + 1 < maze.width && !maze.hasRightWall(x, y)) grid[dr][dc + 1] = ' ';
      if (y + 1 < maze.height && !maze.hasDownWall(x, y)) grid[dr + 1][dc] = ' ';
    }
  }

  grid[1][0] = ' ';
  grid[2 * maze.height - 1][2 * maze.width] = ' ';
  return grid;
}
