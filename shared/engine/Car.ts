/**
 * Car - a single vehicle on the cellular road
 *
 * Update rule (one tick, all cars simultaneously):
 * 1. Crashed cars stand still and count down their crash timer
 * 2. Accelerate by one, up to MAX_VELOCITY
 * 3. Brake so the car stops short of the cell the car ahead held pre-tick
 * 4. Randomly slow down by one (stop-and-go waves)
 * 5. Move `velocity` cells forward, wrapping around the track
 */

import { MAX_VELOCITY, SLOWDOWN_PROBABILITY } from '../constants/traffic.ts';
import type { CarState, LaneChoice } from '../types/simulation.types.ts';
import { circularDistance, findBehindAndAhead } from './NeighborSearch.ts';
import { chance, type RandomSource } from './random.ts';

/** Space score of a lane that cannot be entered this tick */
export const DISQUALIFIED = -1;

export interface AdjacentCar {
  readonly position: number;
  readonly velocity: number;
}

export class Car {
  readonly id: number;
  position: number;
  velocity: number;
  crashTimer: number;

  constructor(id: number, position: number, velocity: number, crashTimer = 0) {
    this.id = id;
    this.position = position;
    this.velocity = velocity;
    this.crashTimer = crashTimer;
  }

  get isCrashed(): boolean {
    return this.crashTimer > 0;
  }

  crash(duration: number): void {
    this.crashTimer = duration;
  }

  /**
   * No-lane-change rule. `gap` is the forward distance to the next car on
   * the same lane, from the pre-tick snapshot.
   */
  advance(gap: number, length: number, rng: RandomSource): void {
    if (this.holdForCrash()) return;

    if (this.velocity < MAX_VELOCITY) {
      this.velocity += 1;
    }
    this.velocity = Math.max(0, Math.min(this.velocity, gap - 1));
    if (this.velocity > 0 && chance(rng, SLOWDOWN_PROBABILITY)) {
      this.velocity -= 1;
    }
    this.position = (this.position + this.velocity) % length;
  }

  /**
   * Lane-change rule. Stays (and advances) or reports the side it wants to
   * move to; a car that changes lane keeps its position and velocity this tick.
   * `left`/`right` are pre-tick views of the adjacent lanes, null at the edge.
   */
  advanceWithLaneChange(
    gap: number,
    left: readonly AdjacentCar[] | null,
    right: readonly AdjacentCar[] | null,
    length: number,
    rng: RandomSource
  ): LaneChoice {
    if (this.holdForCrash()) return 'stay';

    const choice = selectLane(
      gap,
      left ? adjacentLaneSpace(this.position, left, length) : DISQUALIFIED,
      right ? adjacentLaneSpace(this.position, right, length) : DISQUALIFIED
    );
    if (choice === 'stay') {
      this.advance(gap, length, rng);
    }
    return choice;
  }

  toState(): CarState {
    return {
      id: this.id,
      position: this.position,
      velocity: this.velocity,
      crashTimer: this.crashTimer,
    };
  }

  private holdForCrash(): boolean {
    if (this.crashTimer <= 0) return false;
    this.velocity = 0;
    this.crashTimer -= 1;
    return true;
  }
}

/**
 * Free space a car at `position` would get by moving into `lane` now, or
 * DISQUALIFIED when the cell is taken or the nearest car behind could reach
 * it within one tick (its velocity plus one acceleration step).
 */
export function adjacentLaneSpace(position: number, lane: readonly AdjacentCar[], length: number): number {
  if (lane.some(car => car.position === position)) {
    return DISQUALIFIED;
  }

  const { behind, ahead } = findBehindAndAhead(position, lane, length);
  if (behind && circularDistance(behind.position, position, length) <= behind.velocity + 1) {
    return DISQUALIFIED;
  }
  return ahead ? circularDistance(position, ahead.position, length) : length;
}

/**
 * Largest space wins. Ties go to the current lane, then right, then left.
 */
export function selectLane(currentSpace: number, leftSpace: number, rightSpace: number): LaneChoice {
  const best = Math.max(currentSpace, leftSpace, rightSpace);
  if (currentSpace === best) return 'stay';
  if (rightSpace === best) return 'right';
  return 'left';
}
