import { describe, expect, it } from 'vitest';
import {
  chance,
  createSeededRandom,
  createSequenceRandom,
  randomInt,
  sampleWithoutReplacement,
} from '../engine/random.ts';

describe('random sources', () => {
  it('replays a sequence and cycles when exhausted', () => {
    const rng = createSequenceRandom([0.1, 0.2]);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([0.1, 0.2, 0.1]);
  });

  it('rejects an empty sequence', () => {
    expect(() => createSequenceRandom([])).toThrow(RangeError);
  });

  it('produces the same stream for the same seed', () => {
    const a = createSeededRandom(1234);
    const b = createSeededRandom(1234);
    const first = Array.from({ length: 20 }, () => a.next());
    const second = Array.from({ length: 20 }, () => b.next());

    expect(first).toEqual(second);
    first.forEach(value => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });

  it('diverges for different seeds', () => {
    expect(createSeededRandom(1).next()).not.toBe(createSeededRandom(2).next());
  });
});

describe('random helpers', () => {
  it('treats chance as a strict comparison', () => {
    const rng = createSequenceRandom([0.3]);
    expect(chance(rng, 0.5)).toBe(true);
    expect(chance(rng, 0.3)).toBe(false);
  });

  it('maps draws onto an inclusive integer range', () => {
    const rng = createSequenceRandom([0, 0.999, 0.5]);
    expect(randomInt(rng, 1, 5)).toBe(1);
    expect(randomInt(rng, 1, 5)).toBe(5);
    expect(randomInt(rng, 1, 5)).toBe(3);
  });

  it('samples distinct values', () => {
    expect(sampleWithoutReplacement(createSequenceRandom([0]), 5, 3)).toEqual([0, 1, 2]);
    expect(sampleWithoutReplacement(createSequenceRandom([0.999]), 5, 3)).toEqual([4, 0, 1]);

    const sample = sampleWithoutReplacement(createSeededRandom(9), 50, 50);
    expect(new Set(sample).size).toBe(50);
  });

  it('refuses to sample more values than exist', () => {
    expect(() => sampleWithoutReplacement(createSequenceRandom([0]), 3, 4)).toThrow(RangeError);
  });
});
