import { describe, expect, it } from 'vitest';
import { circularDistance, findBehindAndAhead, gapAhead } from '../engine/NeighborSearch.ts';

const at = (...positions: number[]) => positions.map(position => ({ position }));

describe('circularDistance', () => {
  it('measures forward distance with wraparound', () => {
    expect(circularDistance(15, 17, 20)).toBe(2);
    expect(circularDistance(17, 2, 20)).toBe(5);
    expect(circularDistance(5, 5, 20)).toBe(0);
  });
});

describe('findBehindAndAhead', () => {
  it('finds neighbours across the wrap point', () => {
    const cars = at(2, 9, 15);
    const { behind, ahead } = findBehindAndAhead(17, cars, 20);

    expect(behind).toBe(cars[2]);
    expect(ahead).toBe(cars[0]);
  });

  it('returns null on both sides for an empty lane', () => {
    expect(findBehindAndAhead(4, [], 20)).toEqual({ behind: null, ahead: null });
  });

  it('ignores a car on the queried cell itself', () => {
    const cars = at(2, 9, 15);
    const { behind, ahead } = findBehindAndAhead(9, cars, 20);

    expect(behind).toBe(cars[0]);
    expect(ahead).toBe(cars[2]);
  });

  it('reports a lone car as both behind and ahead', () => {
    const cars = at(10);
    const { behind, ahead } = findBehindAndAhead(3, cars, 20);

    expect(behind).toBe(cars[0]);
    expect(ahead).toBe(cars[0]);
  });
});

describe('gapAhead', () => {
  it('uses the next car in sorted order', () => {
    expect(gapAhead(0, [2, 9, 15], 20)).toBe(7);
    expect(gapAhead(1, [2, 9, 15], 20)).toBe(6);
  });

  it('wraps from the last car to the first', () => {
    expect(gapAhead(2, [2, 9, 15], 20)).toBe(7);
  });

  it('gives a lone car the whole loop', () => {
    expect(gapAhead(0, [11], 20)).toBe(20);
  });
});
