export type Rng = () => number;

/** mulberry32: deterministic floats in [0, 1) from a 32-bit seed. */
export function prng(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function seedFromHex(hex: string): number {
  // first 8 hex chars
  return parseInt(hex.slice(0, 8), 16) >>> 0;
}

export function randomInt(rnd: Rng, maxExclusive: number): number {
  return Math.floor(rnd() * maxExclusive);
}
