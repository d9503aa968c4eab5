// engine/src/maze.ts
//
// Rectangular grid maze. Storage is edge-based: for each cell keep only the
// East and South edges; North/West are read from the neighbor.

import { MazeError } from './errors.js';
import { stableHash } from './hash.js';
import type { CellId, Dir, Passage, Point } from './types.js';

// Edge encoding inside the east/south arrays:
export const EDGE_WALL = 0;
export const EDGE_OPEN = 1;

export class Maze {
  readonly width: number;
  readonly height: number;
  /** Seed the generator ran with, or null for hand-built mazes. */
  readonly seed: number | null;

  private readonly east: Uint8Array;
  private readonly south: Uint8Array;

  constructor(width: number, height: number, east: Uint8Array, south: Uint8Array, seed: number | null = null) {
    assertDimensions(width, height);
    if (east.length !== width * height || south.length !== width * height) {
      throw new MazeError('InvalidDimensions', `edge arrays must hold ${width * height} cells`);
    }
    this.width = width;
    this.height = height;
    this.seed = seed;
    // Any non-zero byte means open; stored as EDGE_OPEN.
    this.east = Uint8Array.from(east, toEdge);
    this.south = Uint8Array.from(south, toEdge);
  }

  get cellCount(): number {
    return this.width * this.height;
  }

  cellId(x: number, y: number): CellId {
    return y * this.width + x;
  }

  pointOf(id: CellId): Point {
    return { x: id % this.width, y: Math.floor(id / this.width) };
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  hasRightWall(x: number, y: number): boolean {
    return this.east[this.cellId(x, y)] === EDGE_WALL;
  }

  hasDownWall(x: number, y: number): boolean {
    return this.south[this.cellId(x, y)] === EDGE_WALL;
  }

  canMove(x: number, y: number, dir: Dir): boolean {
    if (!this.inBounds(x, y)) return false;

    if (dir === 'N') {
      if (y === 0) return false;
      return !this.hasDownWall(x, y - 1);
    }
    if (dir === 'E') {
      if (x + 1 >= this.width) return false;
      return !this.hasRightWall(x, y);
    }
    if (dir === 'S') {
      if (y + 1 >= this.height) return false;
      return !this.hasDownWall(x, y);
    }
    // W
    if (x === 0) return false;
    return !this.hasRightWall(x - 1, y);
  }

  /** Neighbor in `dir`, or null when it would leave the grid. */
  neighbor(x: number, y: number, dir: Dir): Point | null {
    const { nx, ny } = step(x, y, dir);
    return this.inBounds(nx, ny) ? { x: nx, y: ny } : null;
  }

  removedWallCount(): number {
    let n = 0;
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const i = this.cellId(x, y);
        if (x + 1 < this.width && this.east[i] === EDGE_OPEN) n++;
        if (y + 1 < this.height && this.south[i] === EDGE_OPEN) n++;
      }
    }
    return n;
  }

  passages(): Passage[] {
    const out: Passage[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (x + 1 < this.width && !this.hasRightWall(x, y)) out.push({ x, y, dir: 'E' });
        if (y + 1 < this.height && !this.hasDownWall(x, y)) out.push({ x, y, dir: 'S' });
      }
    }
    return out;
  }

  /** Copies of the raw edge arrays (1 = open), for wire transfer. */
  edges(): { east: number[]; south: number[] } {
    return { east: Array.from(this.east), south: Array.from(this.south) };
  }

  fingerprint(): string {
    return stableHash({ w: this.width, h: this.height, east: this.east, south: this.south });
  }
}

export function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new MazeError('InvalidDimensions', `maze dimensions must be positive integers, got ${width}x${height}`);
  }
}

export function mazeFromPassages(width: number, height: number, passages: readonly Passage[], seed: number | null = null): Maze {
  assertDimensions(width, height);
  const east = new Uint8Array(width * height);
  const south = new Uint8Array(width * height);

  for (const p of passages) {
    const nx = p.dir === 'E' ? p.x + 1 : p.x;
    const ny = p.dir === 'S' ? p.y + 1 : p.y;
    if (!inGrid(width, height, p.x, p.y) || !inGrid(width, height, nx, ny)) {
      throw new MazeError('InvalidCell', `passage (${p.x},${p.y},${p.dir}) leaves the ${width}x${height} grid`);
    }
    const i = p.y * width + p.x;
    if (p.dir === 'E') east[i] = EDGE_OPEN;
    else south[i] = EDGE_OPEN;
  }

  return new Maze(width, height, east, south, seed);
}

export function step(x: number, y: number, dir: Dir): { nx: number; ny: number } {
  if (dir === 'N') return { nx: x, ny: y - 1 };
  if (dir === 'S') return { nx: x, ny: y + 1 };
  if (dir === 'E') return { nx: x + 1, ny: y };
  return { nx: x - 1, ny: y };
}

export function oppositeOf(d: Dir): Dir {
  return d === 'N' ? 'S' : d === 'S' ? 'N' : d === 'E' ? 'W' : 'E';
}

function toEdge(v: number): number {
  return v === EDGE_WALL ? EDGE_WALL : EDGE_OPEN;
}

function inGrid(width: number, height: number, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < width && y < height;
}
