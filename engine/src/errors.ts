// engine/src/errors.ts

export type MazeErrorCode = 'InvalidDimensions' | 'InvalidCell';

export class MazeError extends Error {
  readonly code: MazeErrorCode;

  constructor(code: MazeErrorCode, message: string) {
    super(message);
    this.name = 'MazeError';
    this.code = code;
  }
}

export function isMazeError(e: unknown): e is MazeError {
  return e instanceof MazeError;
}
