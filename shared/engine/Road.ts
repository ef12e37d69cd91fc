/**
 * Road - parallel circular lanes of equal length, ticked together
 *
 * Lane i's left neighbour is lane i - 1 and its right neighbour lane i + 1.
 * In lane-change mode every lane decides from pre-tick views of its
 * neighbours; cars that choose to move are collected and transferred only
 * after all lanes have ticked, so no lane mutates another lane's cars.
 */

import {
  CRASH_DURATION_TICKS,
  CRASH_PROBABILITY,
  EMPTY_CELL,
} from '../constants/traffic.ts';
import { getLogger } from '../logging/sharedLogger.ts';
import type { Logger } from '../logging/Logger.ts';
import type { CarState, CrashEvent, TickMode, TickSummary, VelocityGrid } from '../types/simulation.types.ts';
import type { Car } from './Car.ts';
import { EmptyLaneError, RoadConfigError } from './errors.ts';
import { Lane } from './Lane.ts';
import { chance, mathRandom, randomInt, type RandomSource } from './random.ts';

export interface RoadOptions {
  /** Source of every random draw (default: Math.random) */
  rng?: RandomSource;
  /** Default: the shared logger */
  logger?: Logger;
  /** Chance of a crash roll succeeding, rolled once per lane per tick */
  crashProbability?: number;
  /** Ticks a crashed car stays immobilized */
  crashDuration?: number;
}

interface PendingTransfer {
  car: Car;
  from: number;
  to: number;
}

function validateRoad(numLanes: number, length: number, carsPerLane: number, crashProbability: number, crashDuration: number): void {
  if (!Number.isInteger(numLanes) || numLanes < 1) {
    throw new RoadConfigError(`numLanes must be a positive integer, got ${numLanes}`);
  }
  if (!Number.isInteger(length) || length < 1) {
    throw new RoadConfigError(`length must be a positive integer, got ${length}`);
  }
  if (!Number.isInteger(carsPerLane) || carsPerLane < 0) {
    throw new RoadConfigError(`carsPerLane must be a non-negative integer, got ${carsPerLane}`);
  }
  if (carsPerLane > length) {
    throw new RoadConfigError(`carsPerLane (${carsPerLane}) exceeds lane length (${length})`);
  }
  if (!(crashProbability >= 0 && crashProbability <= 1)) {
    throw new RoadConfigError(`crashProbability must be within [0, 1], got ${crashProbability}`);
  }
  if (!Number.isInteger(crashDuration) || crashDuration < 0) {
    throw new RoadConfigError(`crashDuration must be a non-negative integer, got ${crashDuration}`);
  }
}

export class Road {
  readonly numLanes: number;
  readonly length: number;
  readonly lanes: readonly Lane[];
  readonly crashProbability: number;
  readonly crashDuration: number;

  private readonly rng: RandomSource;
  private readonly logger: Logger;
  private readonly crashLogger: Logger;
  private readonly laneLogger: Logger;
  private ticks = 0;

  constructor(numLanes: number, length: number, carsPerLane: number, options: RoadOptions = {}) {
    const crashProbability = options.crashProbability ?? CRASH_PROBABILITY;
    const crashDuration = options.crashDuration ?? CRASH_DURATION_TICKS;
    validateRoad(numLanes, length, carsPerLane, crashProbability, crashDuration);

    this.numLanes = numLanes;
    this.length = length;
    this.crashProbability = crashProbability;
    this.crashDuration = crashDuration;
    this.rng = options.rng ?? mathRandom;

    const baseLogger = options.logger ?? getLogger();
    this.logger = baseLogger.forCategory('SIMULATION');
    this.crashLogger = baseLogger.forCategory('CRASH');
    this.laneLogger = baseLogger.forCategory('LANE_CHANGE');

    let nextId = 0;
    const allocateId = () => nextId++;
    this.lanes = Array.from({ length: numLanes }, () => Lane.populate(length, carsPerLane, this.rng, allocateId));

    this.logger.debug('Road initialized', { numLanes, length, carsPerLane, crashProbability, crashDuration });
  }

  /** Number of completed ticks */
  get tickCount(): number {
    return this.ticks;
  }

  getLane(index: number): Lane {
    this.assertLaneIndex(index);
    return this.lanes[index];
  }

  carCount(): number {
    return this.lanes.reduce((sum, lane) => sum + lane.size, 0);
  }

  laneCounts(): number[] {
    return this.lanes.map(lane => lane.size);
  }

  /**
   * One tick without lane changes.
   */
  tick(): TickSummary {
    const tick = this.ticks + 1;
    const crashes: CrashEvent[] = [];

    for (const lane of this.lanes) {
      lane.tick(this.rng);
      this.rollForCrash(tick, crashes);
    }

    this.ticks = tick;
    return this.summarize(tick, 'no-lane-change', 0, 0, crashes);
  }

  /**
   * One tick with lane changes.
   */
  tickWithLaneChanges(): TickSummary {
    const tick = this.ticks + 1;
    const crashes: CrashEvent[] = [];
    const views: CarState[][] = this.lanes.map(lane => lane.view());
    const pending: PendingTransfer[] = [];

    this.lanes.forEach((lane, i) => {
      const left = i > 0 ? views[i - 1] : null;
      const right = i < this.numLanes - 1 ? views[i + 1] : null;
      for (const { car, direction } of lane.tickWithLaneChange(left, right, this.rng)) {
        pending.push({ car, from: i, to: direction === 'left' ? i - 1 : i + 1 });
      }
    });

    const { moved, rejected } = this.transfer(pending, tick);

    // Rolled once per lane after transfers, so cars that just moved can crash
    for (let i = 0; i < this.numLanes; i++) {
      this.rollForCrash(tick, crashes);
    }
    this.ticks = tick;
    return this.summarize(tick, 'lane-change', moved, rejected, crashes);
  }

  /**
   * Velocity grid [numLanes][length]; EMPTY_CELL where no car stands.
   */
  snapshot(): VelocityGrid {
    const grid: VelocityGrid = this.lanes.map(() => new Array<number>(this.length).fill(EMPTY_CELL));
    this.lanes.forEach((lane, laneIndex) => {
      for (const car of lane.getCars()) {
        grid[laneIndex][car.position] = car.velocity;
      }
    });
    return grid;
  }

  /**
   * Crash a random car on a specific lane, outside the per-tick roll.
   */
  injectCrash(laneIndex: number): CrashEvent {
    this.assertLaneIndex(laneIndex);
    if (this.lanes[laneIndex].size === 0) {
      throw new EmptyLaneError(laneIndex);
    }
    return this.crashLane(laneIndex, this.ticks, 'manual');
  }

  private rollForCrash(tick: number, crashes: CrashEvent[]): void {
    if (!chance(this.rng, this.crashProbability)) return;

    const laneIndex = randomInt(this.rng, 0, this.numLanes - 1);
    if (this.lanes[laneIndex].size === 0) {
      this.crashLogger.debug('Crash roll hit an empty lane', { laneIndex, tick });
      return;
    }
    crashes.push(this.crashLane(laneIndex, tick, 'random'));
  }

  private crashLane(laneIndex: number, tick: number, source: CrashEvent['source']): CrashEvent {
    const car = this.lanes[laneIndex].injectCrash(this.rng, this.crashDuration);
    const event: CrashEvent = {
      tick,
      laneIndex,
      carId: car.id,
      position: car.position,
      duration: this.crashDuration,
      source,
    };
    this.crashLogger.info('Crash injected', {
      tick,
      laneIndex,
      carId: car.id,
      position: car.position,
      duration: this.crashDuration,
      source,
    });
    return event;
  }

  /**
   * Hands departing cars to their destination lanes in lane order. A car whose
   * target cell was taken by an earlier arrival goes back to its own lane,
   * where its cell is still free: nobody else could claim it this tick.
   */
  private transfer(pending: PendingTransfer[], tick: number): { moved: number; rejected: number } {
    let moved = 0;
    let rejected = 0;

    for (const { car, from, to } of pending) {
      const target = this.lanes[to];
      if (target.isOccupied(car.position)) {
        this.lanes[from].addCar(car);
        rejected += 1;
        this.laneLogger.trace('Lane change rejected', { tick, carId: car.id, from, to, position: car.position });
        continue;
      }
      target.addCar(car);
      moved += 1;
      this.laneLogger.trace('Lane changed', { tick, carId: car.id, from, to, position: car.position });
    }

    return { moved, rejected };
  }

  private summarize(tick: number, mode: TickMode, laneChanges: number, rejectedLaneChanges: number, crashes: CrashEvent[]): TickSummary {
    return { tick, mode, laneChanges, rejectedLaneChanges, crashes };
  }

  private assertLaneIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.numLanes) {
      throw new RoadConfigError(`Lane index ${index} is out of range [0, ${this.numLanes - 1}]`);
    }
  }
}
