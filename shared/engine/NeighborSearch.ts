/**
 * Neighbor Search - circular-track distance helpers
 *
 * All distances are measured forward along the track: the distance from `a`
 * to `b` is how many cells a car at `a` must advance to reach `b`.
 */

export interface Positioned {
  readonly position: number;
}

export interface Neighbors<T extends Positioned> {
  behind: T | null;
  ahead: T | null;
}

/** Forward distance from `from` to `to`, in [0, length) */
export function circularDistance(from: number, to: number, length: number): number {
  return (((to - from) % length) + length) % length;
}

/**
 * Nearest car circularly behind and ahead of `position`.
 *
 * Cars sitting on `position` itself are neither behind nor ahead, so the
 * subject's own lane can be queried without excluding the subject by identity.
 */
export function findBehindAndAhead<T extends Positioned>(
  position: number,
  cars: readonly T[],
  length: number
): Neighbors<T> {
  let behind: T | null = null;
  let ahead: T | null = null;
  let minBehind = length;
  let minAhead = length;

  for (const car of cars) {
    const back = circularDistance(car.position, position, length);
    if (back > 0 && back < minBehind) {
      minBehind = back;
      behind = car;
    }
    const front = circularDistance(position, car.position, length);
    if (front > 0 && front < minAhead) {
      minAhead = front;
      ahead = car;
    }
  }

  return { behind, ahead };
}

/**
 * Gap from `cars[index]` to the next car of a position-sorted lane.
 * A car alone on its lane sees the whole loop.
 */
export function gapAhead(index: number, positions: readonly number[], length: number): number {
  const n = positions.length;
  if (n === 1) return length;
  const gap = circularDistance(positions[index], positions[(index + 1) % n], length);
  return gap === 0 ? length : gap;
}
