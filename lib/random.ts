export type UniformGenerator = () => number;

export interface RandomSource {
  next: UniformGenerator;
  chooseUniform: <T>(items: readonly T[]) => T;
  uniformInt: (low: number, high: number) => number;
  poisson: (mean: number, lag: number) => number;
}

const MAX_POISSON_STEPS = 10_000;

export function mulberry32(seed: number): UniformGenerator {
  let state = seed >>> 0;
  return () => {
    state += 0x6d2b79f5;
    let x = Math.imul(state ^ (state >>> 15), 1 | state);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(next: UniformGenerator): RandomSource {
  function uniformInt(low: number, high: number): number {
    const lo = Math.ceil(Math.min(low, high));
    const hi = Math.floor(Math.max(low, high));
    const value = Math.floor(next() * (hi - lo + 1)) + lo;
    return Math.max(lo, Math.min(hi, value));
  }

  function chooseUniform<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("cannot choose from an empty list");
    }
    return items[uniformInt(0, items.length - 1)];
  }

  // Knuth's multiplication method, shifted so every draw is at least `lag`.
  function poisson(mean: number, lag: number): number {
    const offset = Math.max(0, Math.round(lag));
    if (!Number.isFinite(mean) || mean <= 0) {
      return offset;
    }
    const limit = Math.exp(-mean);
    let count = 0;
    let product = 1;
    do {
      count += 1;
      product *= next();
    } while (product > limit && count < MAX_POISSON_STEPS);
    return offset + count - 1;
  }

  return { next, chooseUniform, uniformInt, poisson };
}

export function createSeededRandom(seed: number): RandomSource {
  return createRandomSource(mulberry32(seed));
}
