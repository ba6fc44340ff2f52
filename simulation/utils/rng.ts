// Uniform stream in [0, 1).
export type Rng = () => number;

// mulberry32: small, fast and fully determined by its 32-bit seed.
export function createRng(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export function deriveSeed(seed: number, streamIndex: number): number {
  return (seed ^ Math.imul(streamIndex + 1, 0x9e3779b9)) >>> 0;
}
