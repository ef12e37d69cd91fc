/**
 * Cellular automaton constants (cells and ticks).
 */

export const MAX_VELOCITY = 5;

/** Initial velocities are drawn from [MIN_INITIAL_VELOCITY, MAX_VELOCITY] */
export const MIN_INITIAL_VELOCITY = 1;

/** Probability that a moving car drops one unit of velocity each tick */
export const SLOWDOWN_PROBABILITY = 0.5;

export const CRASH_PROBABILITY = 0.01;
export const CRASH_DURATION_TICKS = 30;

/** Grid value for a cell with no car */
export const EMPTY_CELL = -1;

// 7-lane demo road
export const DEFAULT_ROAD = {
  numLanes: 7,
  length: 300,
  carsPerLane: 60,
} as const;
