export type Random = () => number;

/**
 * Mulberry32 – fast 32-bit seeded PRNG.
 * Returns a function that yields deterministic floats in [0, 1).
 */
export function createSeededRandom(seed: number): Random {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
