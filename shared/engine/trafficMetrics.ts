import type { LaneMetrics, TrafficMetrics } from '../types/simulation.types.ts';
import type { Road } from './Road.ts';

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Aggregate flow statistics of the road's current state.
 */
export function measureTraffic(road: Road): TrafficMetrics {
  const velocities: number[] = [];
  let crashedCars = 0;

  const lanes: LaneMetrics[] = road.lanes.map(lane => {
    const laneVelocities = lane.velocities();
    velocities.push(...laneVelocities);
    crashedCars += lane.getCars().filter(car => car.isCrashed).length;
    return { cars: lane.size, meanVelocity: mean(laneVelocities) };
  });

  const cars = velocities.length;
  const density = cars / (road.numLanes * road.length);
  const meanVelocity = mean(velocities);

  return {
    tick: road.tickCount,
    cars,
    density,
    meanVelocity,
    flow: density * meanVelocity,
    stoppedCars: velocities.filter(v => v === 0).length,
    crashedCars,
    lanes,
  };
}
