function intFromEnv(name: string, fallback: number): number {
  const raw = (process.env[name] ?? '').trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) ? n : fallback;
}

export const CONFIG = {
  port: intFromEnv('PORT', 3000),
  wsPath: process.env.WS_PATH ?? '/ws',

  /**
   * Dev Origin allowlist for WebSocket connections.
   *
   * - HTTP_ORIGIN: single origin
   * - HTTP_ORIGINS: comma-separated list of origins
   * - Set either to "*" to disable origin checking in dev
   *
   * Examples:
   *   HTTP_ORIGINS="http://localhost:5173,http://192.168.1.72:5173"
   *   HTTP_ORIGINS="*"
   */
  httpOrigins: (() => {
    const rawList = (process.env.HTTP_ORIGINS ?? '').trim();
    const rawSingle = (process.env.HTTP_ORIGIN ?? '').trim();

    const combined = [
      ...(rawList ? rawList.split(',').map((s) => s.trim()).filter(Boolean) : []),
      ...(rawSingle ? [rawSingle] : [])
    ];

    if (combined.includes('*')) return ['*'];

    if (combined.length === 0) return ['http://localhost:5173'];

    return Array.from(new Set(combined));
  })(),

  // Size used when a client asks for a maze without dimensions.
  mazeWidth: intFromEnv('MAZE_WIDTH', 30),
  mazeHeight: intFromEnv('MAZE_HEIGHT', 15),
  maxMazeSize: intFromEnv('MAZE_MAX_SIZE', 120),

  // Unset => every new maze draws a fresh seed.
  mazeSeed: (() => {
    const raw = (process.env.MAZE_SEED ?? '').trim().toLowerCase();
    if (raw === '' || raw === 'random') return null;
    const n = Number(raw);
    return Number.isInteger(n) ? n : null;
  })(),

  defaultSpeed: 5,

  // Per-frame delay for speed 1 (slow) .. 10 (fast)
  speedDelaysMs: [500, 300, 200, 100, 80, 60, 40, 25, 10, 1]
} as const;

export function delayForSpeed(speed: number, table: readonly number[] = CONFIG.speedDelaysMs): number {
  const i = Math.min(table.length, Math.max(1, Math.round(speed))) - 1;
  return table[i];
}
