// engine/src/index.ts

export * from './types.js';
export { MazeError, isMazeError } from './errors.js';
export type { MazeErrorCode } from './errors.js';
export { stableHash } from './hash.js';
export { XorShift32, hashSeed, randomSeed, shuffleInPlace } from './prng.js';
export { UnionFind } from './unionFind.js';
export { EDGE_OPEN, EDGE_WALL, Maze, mazeFromPassages, oppositeOf, step } from './maze.js';
export { generateMaze } from './generator.js';
export { PriorityFrontier, QueueFrontier, StackFrontier } from './frontier.js';
export type { Frontier } from './frontier.js';
export {
  isSimplePath,
  manhattan,
  reachableFrom,
  reconstructPath,
  resolveEndpoints,
  runSearch,
  searchSteps,
  terminalEvent
} from './search.js';
export type { SearchGenerator } from './search.js';
export { FRAME_LEGEND, GLYPH, frameFromEvent, renderFrame } from './ascii.js';
export type { Frame, FrameOverlay } from './ascii.js';
