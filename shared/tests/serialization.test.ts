import { describe, expect, it } from 'vitest';
import { serializeRoad } from '../engine/serialization.ts';
import { applyRoadDelta, diffRoadSnapshots } from '../engine/stateDiff.ts';
import { createSeededRandom } from '../engine/random.ts';
import { Road } from '../engine/Road.ts';
import { createLogger } from '../logging/Logger.ts';
import { LogLevel } from '../logging/LogLevel.ts';
import type { RoadSnapshot, VelocityGrid } from '../types/simulation.types.ts';

function snapshotOf(tick: number, grid: VelocityGrid): RoadSnapshot {
  return {
    tick,
    timestamp: 1_700_000_000_000 + tick * 100,
    numLanes: grid.length,
    length: grid[0].length,
    grid,
    laneCounts: grid.map(row => row.filter(cell => cell >= 0).length),
  };
}

describe('serializeRoad', () => {
  it('captures the road state at a point in time', () => {
    const road = new Road(2, 10, 3, {
      rng: createSeededRandom(4),
      logger: createLogger({ env: 'engine', minLevel: LogLevel.SILENT }),
    });
    const snapshot = serializeRoad(road, 1234);

    expect(snapshot.tick).toBe(0);
    expect(snapshot.timestamp).toBe(1234);
    expect(snapshot.numLanes).toBe(2);
    expect(snapshot.length).toBe(10);
    expect(snapshot.laneCounts).toEqual([3, 3]);
    expect(snapshot.grid).toEqual(road.snapshot());
  });

  it('does not share the grid with later ticks', () => {
    const road = new Road(1, 10, 4, {
      rng: createSeededRandom(6),
      logger: createLogger({ env: 'engine', minLevel: LogLevel.SILENT }),
    });
    const before = serializeRoad(road, 0);
    const copy = before.grid.map(row => [...row]);
    road.tick();

    expect(before.grid).toEqual(copy);
  });
});

describe('diffRoadSnapshots', () => {
  const previous = snapshotOf(1, [[-1, 2, -1], [0, -1, -1]]);
  const current = snapshotOf(2, [[-1, -1, 3], [0, -1, -1]]);

  it('sends the full grid when there is no previous snapshot', () => {
    const delta = diffRoadSnapshots(null, current);

    expect(delta.full).toBe(true);
    expect(delta.grid).toEqual(current.grid);
    expect(delta.grid).not.toBe(current.grid);
    expect(delta.changes).toEqual([]);
  });

  it('lists changed cells in lane and position order', () => {
    const delta = diffRoadSnapshots(previous, current);

    expect(delta.full).toBe(false);
    expect(delta.grid).toBeUndefined();
    expect(delta.tick).toBe(2);
    expect(delta.changes).toEqual([
      { lane: 0, position: 1, velocity: -1 },
      { lane: 0, position: 2, velocity: 3 },
    ]);
    expect(delta.laneCounts).toEqual([1, 1]);
  });

  it('falls back to a full grid when the road shape changes', () => {
    const wider = snapshotOf(2, [[-1, -1, 3, -1], [0, -1, -1, -1]]);
    expect(diffRoadSnapshots(previous, wider).full).toBe(true);
  });
});

describe('applyRoadDelta', () => {
  it('rebuilds the current grid from the previous one', () => {
    const previous = snapshotOf(1, [[-1, 2, -1], [0, -1, -1]]);
    const current = snapshotOf(2, [[-1, -1, 3], [1, -1, -1]]);

    const rebuilt = applyRoadDelta(previous.grid, diffRoadSnapshots(previous, current));

    expect(rebuilt).toEqual(current.grid);
    expect(previous.grid[0]).toEqual([-1, 2, -1]);
  });

  it('needs a base grid for a partial delta', () => {
    const delta = diffRoadSnapshots(snapshotOf(1, [[0]]), snapshotOf(2, [[-1]]));
    expect(() => applyRoadDelta(null, delta)).toThrow('Delta for tick 2 needs a base grid');
  });
});
