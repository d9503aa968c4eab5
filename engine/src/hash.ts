// Stable hash for wall-grid fingerprints and determinism tests.
// Not cryptographic.

export function stableHash(obj: unknown): string {
  const s = stableStringify(obj);
  let h = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 16777619) >>> 0;
  }
  return (h >>> 0).toString(16).padStart(8, '0');
}

function stableStringify(obj: unknown): string {
  return JSON.stringify(obj, replacer);
}

function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Uint8Array) return Array.from(value);
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) out[k] = v;
    return out;
  }
  return value;
}
