import { CRASH_DURATION_TICKS, CRASH_PROBABILITY, DEFAULT_ROAD } from '@shared/constants/traffic.ts';
import { createSeededRandom, mathRandom } from '@shared/engine/random.ts';
import { Road } from '@shared/engine/Road.ts';
import { serializeRoad } from '@shared/engine/serialization.ts';
import { measureTraffic } from '@shared/engine/trafficMetrics.ts';
import type { Logger } from '@shared/logging/Logger.ts';
import type {
  CrashEvent,
  RoadSnapshot,
  TickMode,
  TickSummary,
  TrafficMetrics,
} from '@shared/types/simulation.types.ts';
import { simulationLogger } from '../logging/index.js';

export interface TrafficSimulationOptions {
  numLanes?: number;
  length?: number;
  carsPerLane?: number;
  /** Apply the lane-change rule (default: true) */
  laneChanges?: boolean;
  crashProbability?: number;
  crashDuration?: number;
  /** Seed for a reproducible run; Math.random when absent */
  seed?: number;
  logger?: Logger;
}

const DEFAULT_OPTIONS = {
  numLanes: DEFAULT_ROAD.numLanes,
  length: DEFAULT_ROAD.length,
  carsPerLane: DEFAULT_ROAD.carsPerLane,
  laneChanges: true,
  crashProbability: CRASH_PROBABILITY,
  crashDuration: CRASH_DURATION_TICKS,
};

export type CrashListener = (event: CrashEvent) => void;

/**
 * Owns one Road and steps it in the configured mode.
 */
export class TrafficSimulation {
  readonly road: Road;
  readonly mode: TickMode;
  private lastSummary: TickSummary | null = null;
  private crashListeners = new Set<CrashListener>();

  constructor(options: TrafficSimulationOptions = {}) {
    const config = {
      numLanes: options.numLanes ?? DEFAULT_OPTIONS.numLanes,
      length: options.length ?? DEFAULT_OPTIONS.length,
      carsPerLane: options.carsPerLane ?? DEFAULT_OPTIONS.carsPerLane,
      laneChanges: options.laneChanges ?? DEFAULT_OPTIONS.laneChanges,
      crashProbability: options.crashProbability ?? DEFAULT_OPTIONS.crashProbability,
      crashDuration: options.crashDuration ?? DEFAULT_OPTIONS.crashDuration,
      seed: options.seed,
      logger: options.logger,
    };
    this.mode = config.laneChanges ? 'lane-change' : 'no-lane-change';
    this.road = new Road(config.numLanes, config.length, config.carsPerLane, {
      rng: config.seed === undefined ? mathRandom : createSeededRandom(config.seed),
      logger: config.logger,
      crashProbability: config.crashProbability,
      crashDuration: config.crashDuration,
    });

    simulationLogger.info('Traffic simulation created', {
      numLanes: config.numLanes,
      length: config.length,
      carsPerLane: config.carsPerLane,
      mode: this.mode,
      seed: config.seed,
    });
  }

  step(timestamp: number): RoadSnapshot {
    const summary = this.mode === 'lane-change' ? this.road.tickWithLaneChanges() : this.road.tick();
    this.lastSummary = summary;
    for (const crash of summary.crashes) {
      this.notifyCrash(crash);
    }
    return serializeRoad(this.road, timestamp);
  }

  /** Current state without advancing */
  snapshot(timestamp: number): RoadSnapshot {
    return serializeRoad(this.road, timestamp);
  }

  crash(laneIndex: number): CrashEvent {
    const event = this.road.injectCrash(laneIndex);
    this.notifyCrash(event);
    return event;
  }

  onCrash(listener: CrashListener): () => void {
    this.crashListeners.add(listener);
    return () => {
      this.crashListeners.delete(listener);
    };
  }

  getLastSummary(): TickSummary | null {
    return this.lastSummary;
  }

  metrics(): TrafficMetrics {
    return measureTraffic(this.road);
  }

  private notifyCrash(event: CrashEvent): void {
    for (const listener of this.crashListeners) {
      try {
        listener(event);
      } catch (error) {
        simulationLogger.logError('Crash listener error', error instanceof Error ? error : new Error(String(error)));
      }
    }
  }
}
