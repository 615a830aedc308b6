/**
 * Seeded pseudo-random helpers for reproducible mock data
 */

export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    let t = state += 0x6D2B79F5;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function hashString(input: string): number {
  let hash = 0;
  for (let i = 0; i < input.length; i += 1) {
    hash = (hash << 5) - hash + input.charCodeAt(i);
    hash |= 0;
  }
  return Math.abs(hash) || 1;
}

export function uniform(rand: RandomSource, min: number, max: number): number {
  return min + rand() * (max - min);
}

/**
 * Normal draw via the Box-Muller transform
 */
export function normal(rand: RandomSource, mean = 0, stdDev = 1): number {
  // 1 - rand() keeps the logarithm argument in (0, 1]
  const u1 = 1 - rand();
  const u2 = rand();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}
