import type { RoadSnapshot } from '../types/simulation.types.ts';
import type { Road } from './Road.ts';

/**
 * Transport snapshot of a road. The grid is freshly built, so callers may
 * keep it after the road moves on.
 */
export function serializeRoad(road: Road, timestamp: number): RoadSnapshot {
  return {
    tick: road.tickCount,
    timestamp,
    numLanes: road.numLanes,
    length: road.length,
    grid: road.snapshot(),
    laneCounts: road.laneCounts(),
  };
}
