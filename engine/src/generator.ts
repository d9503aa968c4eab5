// engine/src/generator.ts
//
// Randomized Kruskal:
// 1) List every candidate edge (right neighbor, down neighbor) in row-major order
// 2) Shuffle the list
// 3) Open the wall of each edge whose endpoints are still in different components
//
// The opened walls form a spanning tree, so every pair of cells is joined by
// exactly one simple path.

import { EDGE_OPEN, Maze, assertDimensions } from './maze.js';
import { XorShift32, hashSeed, randomSeed, shuffleInPlace } from './prng.js';
import type { RandomSource } from './types.js';
import { UnionFind } from './unionFind.js';

const GENERATOR_LABEL = 'kruskal_v1';

type Edge = { x: number; y: number; dir: 'E' | 'S' };

/**
 * Builds a perfect maze. A numeric `random` is used as the seed and recorded on
 * the maze; a custom RandomSource leaves `maze.seed` null.
 */
export function generateMaze(width: number, height: number, random?: number | RandomSource): Maze {
  assertDimensions(width, height);

  let seed: number | null = null;
  let rng: RandomSource;
  if (random === undefined || typeof random === 'number') {
    seed = random ?? randomSeed();
    rng = new XorShift32(hashSeed(seed, width, height, GENERATOR_LABEL));
  } else {
    rng = random;
  }

  const edges: Edge[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (x + 1 < width) edges.push({ x, y, dir: 'E' });
      if (y + 1 < height) edges.push({ x, y, dir: 'S' });
    }
  }
  shuffleInPlace(edges, rng);

  const east = new Uint8Array(width * height);
  const south = new Uint8Array(width * height);
  const sets = new UnionFind(width * height);

  for (const e of edges) {
    const a = e.y * width + e.x;
    const b = e.dir === 'E' ? a + 1 : a + width;
    if (!sets.union(a, b)) continue; // would close a cycle

    if (e.dir === 'E') east[a] = EDGE_OPEN;
    else south[a] = EDGE_OPEN;

    if (sets.componentCount === 1) break;
  }

  return new Maze(width, height, east, south, seed);
}
