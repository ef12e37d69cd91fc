/**
 * Lane - one circular track and the cars on it, kept sorted by position
 *
 * The sorted order lets every car find the car ahead at index (i + 1) % n.
 * Both tick variants read gaps from a pre-tick copy of the positions, so no
 * car ever sees a neighbour's post-update cell within the same tick.
 */

import { MAX_VELOCITY, MIN_INITIAL_VELOCITY } from '../constants/traffic.ts';
import type { CarState, LaneDirection } from '../types/simulation.types.ts';
import { Car, type AdjacentCar } from './Car.ts';
import { EmptyLaneError, OccupiedCellError } from './errors.ts';
import { gapAhead } from './NeighborSearch.ts';
import { randomInt, sampleWithoutReplacement, type RandomSource } from './random.ts';

/** A car that left this lane during a lane-change tick */
export interface Departure {
  car: Car;
  direction: LaneDirection;
}

function byPosition(a: Car, b: Car): number {
  return a.position - b.position;
}

export class Lane {
  readonly length: number;
  private cars: Car[];

  constructor(length: number, cars: Car[] = []) {
    this.length = length;
    this.cars = [...cars].sort(byPosition);
    for (let i = 1; i < this.cars.length; i++) {
      if (this.cars[i].position === this.cars[i - 1].position) {
        throw new OccupiedCellError(this.cars[i].position);
      }
    }
  }

  /**
   * Lane with `count` cars on distinct random cells and random initial
   * velocities in [MIN_INITIAL_VELOCITY, MAX_VELOCITY].
   */
  static populate(length: number, count: number, rng: RandomSource, nextId: () => number): Lane {
    const positions = sampleWithoutReplacement(rng, length, count).sort((a, b) => a - b);
    const cars = positions.map(
      position => new Car(nextId(), position, randomInt(rng, MIN_INITIAL_VELOCITY, MAX_VELOCITY))
    );
    return new Lane(length, cars);
  }

  get size(): number {
    return this.cars.length;
  }

  getCars(): readonly Car[] {
    return this.cars;
  }

  positions(): number[] {
    return this.cars.map(car => car.position);
  }

  velocities(): number[] {
    return this.cars.map(car => car.velocity);
  }

  /** Detached copy of every car's state, in position order */
  view(): CarState[] {
    return this.cars.map(car => car.toState());
  }

  isOccupied(position: number): boolean {
    const index = this.lowerBound(position);
    return index < this.cars.length && this.cars[index].position === position;
  }

  /**
   * Advances every car with the no-lane-change rule.
   */
  tick(rng: RandomSource): void {
    if (this.cars.length === 0) return;

    const positions = this.positions();
    this.cars.forEach((car, i) => {
      car.advance(gapAhead(i, positions, this.length), this.length, rng);
    });
    this.restoreOrder();
  }

  /**
   * Advances every car with the lane-change rule. Cars that pick a side are
   * removed from this lane and handed back to the caller, in lane order.
   */
  tickWithLaneChange(
    left: readonly AdjacentCar[] | null,
    right: readonly AdjacentCar[] | null,
    rng: RandomSource
  ): Departure[] {
    if (this.cars.length === 0) return [];

    const positions = this.positions();
    const leaving: Array<{ index: number; direction: LaneDirection }> = [];
    this.cars.forEach((car, i) => {
      const choice = car.advanceWithLaneChange(gapAhead(i, positions, this.length), left, right, this.length, rng);
      if (choice !== 'stay') {
        leaving.push({ index: i, direction: choice });
      }
    });

    // Descending so earlier indices stay valid while splicing
    const departures: Departure[] = [];
    for (let k = leaving.length - 1; k >= 0; k--) {
      const { index, direction } = leaving[k];
      const [car] = this.cars.splice(index, 1);
      departures.push({ car, direction });
    }
    departures.reverse();

    this.restoreOrder();
    return departures;
  }

  /**
   * Inserts an arriving car at its rank. Ownership passes to this lane.
   */
  addCar(car: Car): void {
    const index = this.lowerBound(car.position);
    if (index < this.cars.length && this.cars[index].position === car.position) {
      throw new OccupiedCellError(car.position);
    }
    this.cars.splice(index, 0, car);
  }

  /**
   * Immobilizes one uniformly chosen car for `duration` ticks.
   */
  injectCrash(rng: RandomSource, duration: number): Car {
    if (this.cars.length === 0) {
      throw new EmptyLaneError();
    }
    const car = this.cars[randomInt(rng, 0, this.cars.length - 1)];
    car.crash(duration);
    return car;
  }

  // Wraparound moves the cars that passed cell 0 to the front
  private restoreOrder(): void {
    this.cars.sort(byPosition);
  }

  private lowerBound(position: number): number {
    let lo = 0;
    let hi = this.cars.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.cars[mid].position < position) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
