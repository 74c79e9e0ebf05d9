/** A source of uniform floats in [0, 1), same contract as Math.random. */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

/** Small deterministic generator (mulberry32) for `--seed` runs and tests. */
export function seededRng(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [0, maxExclusive). */
export function randomInt(rng: Rng, maxExclusive: number): number {
  return Math.min(maxExclusive - 1, Math.floor(rng() * maxExclusive));
}

/** Fisher–Yates over a copy; only the first `take` slots are settled. */
export function shuffle<T>(items: readonly T[], rng: Rng, take: number = items.length): T[] {
  const out = [...items];
  const n = Math.min(take, out.length);
  for (let i = 0; i < n; i++) {
    const j = i + randomInt(rng, out.length - i);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out.slice(0, n);
}
