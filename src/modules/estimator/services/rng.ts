/**
 * Mulberry32 - fast deterministic PRNG
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * FNV-1a of a key mixed into a base seed, so each basket gets its own
 * reproducible stream.
 */
export function stableSeed(base: number, key: string): number {
  let h = (2166136261 ^ base) >>> 0;
  for (let i = 0; i < key.length; i++) {
    h ^= key.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}
