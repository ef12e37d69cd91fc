/**
 * Random Source - injectable uniform generator for the simulation
 *
 * Every stochastic rule (slowdown, crash rolls, initial placement) draws from
 * a RandomSource passed in by the caller, never from ambient state.
 */

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Mulberry32 PRNG. Same seed, same sequence (within this implementation).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0;
  return {
    next() {
      state = (state + 0x6D2B79F5) | 0;
      let t = Math.imul(state ^ (state >>> 15), 1 | state);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Replays a fixed list of values, cycling when exhausted. Handy for scripting
 * exact outcomes of the slowdown and crash rolls.
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError('Sequence random needs at least one value');
  }
  let index = 0;
  return {
    next() {
      const value = values[index % values.length];
      index += 1;
      return value;
    },
  };
}

export function chance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

/** Uniform integer in [min, max] inclusive */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

/**
 * Draws `count` distinct integers from [0, size) (partial Fisher-Yates).
 */
export function sampleWithoutReplacement(rng: RandomSource, size: number, count: number): number[] {
  if (count > size) {
    throw new RangeError(`Cannot sample ${count} distinct values from ${size}`);
  }
  const pool = Array.from({ length: size }, (_, i) => i);
  for (let i = 0; i < count; i++) {
    const j = randomInt(rng, i, size - 1);
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, count);
}
