import type { CellChange, RoadDelta, RoadSnapshot, VelocityGrid } from '../types/simulation.types.ts';

function sameShape(a: RoadSnapshot, b: RoadSnapshot): boolean {
  return a.numLanes === b.numLanes && a.length === b.length;
}

function cloneGrid(grid: VelocityGrid): VelocityGrid {
  return grid.map(row => [...row]);
}

/**
 * Cells whose value differs between two snapshots. The first delta (no
 * previous snapshot) and any change of road shape carry the full grid.
 */
export function diffRoadSnapshots(previous: RoadSnapshot | null, current: RoadSnapshot): RoadDelta {
  if (!previous || !sameShape(previous, current)) {
    return {
      tick: current.tick,
      timestamp: current.timestamp,
      full: true,
      grid: cloneGrid(current.grid),
      changes: [],
      laneCounts: [...current.laneCounts],
    };
  }

  const changes: CellChange[] = [];
  for (let lane = 0; lane < current.numLanes; lane++) {
    const before = previous.grid[lane];
    const after = current.grid[lane];
    for (let position = 0; position < current.length; position++) {
      if (before[position] !== after[position]) {
        changes.push({ lane, position, velocity: after[position] });
      }
    }
  }

  return {
    tick: current.tick,
    timestamp: current.timestamp,
    full: false,
    changes,
    laneCounts: [...current.laneCounts],
  };
}

/**
 * Rebuilds the grid a client holds after receiving `delta`.
 */
export function applyRoadDelta(grid: VelocityGrid | null, delta: RoadDelta): VelocityGrid {
  if (delta.full && delta.grid) {
    return cloneGrid(delta.grid);
  }
  if (!grid) {
    throw new Error(`Delta for tick ${delta.tick} needs a base grid`);
  }
  const next = cloneGrid(grid);
  for (const { lane, position, velocity } of delta.changes) {
    next[lane][position] = velocity;
  }
  return next;
}
