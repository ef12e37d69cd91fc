// ========== Car & Lane State ==========

/** Plain copy of a car's state, safe to hand out across lanes */
export interface CarState {
  id: number;
  position: number;
  velocity: number;
  crashTimer: number;
}

/** Outcome of a car's lane-change evaluation */
export type LaneChoice = 'stay' | 'left' | 'right';

export type LaneDirection = Exclude<LaneChoice, 'stay'>;

/** Which update rule a tick applies */
export type TickMode = 'lane-change' | 'no-lane-change';

/**
 * One row per lane, one column per cell. A cell holds the velocity of the car
 * on it, or EMPTY_CELL (-1).
 */
export type VelocityGrid = number[][];

// ========== Tick Results ==========

export interface CrashEvent {
  tick: number;
  laneIndex: number;
  carId: number;
  position: number;
  duration: number;
  /** 'random' for the per-tick roll, 'manual' for an explicit request */
  source: 'random' | 'manual';
}

export interface TickSummary {
  tick: number;
  mode: TickMode;
  /** Cars that ended the tick in a different lane */
  laneChanges: number;
  /** Lane changes bounced back because the target cell was taken */
  rejectedLaneChanges: number;
  crashes: CrashEvent[];
}

// ========== Snapshots ==========

export interface RoadSnapshot {
  tick: number;
  timestamp: number;
  numLanes: number;
  length: number;
  grid: VelocityGrid;
  laneCounts: number[];
}

export interface CellChange {
  lane: number;
  position: number;
  velocity: number;
}

export interface RoadDelta {
  tick: number;
  timestamp: number;
  /** True when `grid` carries the whole road instead of `changes` */
  full: boolean;
  grid?: VelocityGrid;
  changes: CellChange[];
  laneCounts: number[];
}

// ========== Metrics ==========

export interface LaneMetrics {
  cars: number;
  meanVelocity: number;
}

export interface TrafficMetrics {
  tick: number;
  cars: number;
  /** Cars per cell across the whole road */
  density: number;
  meanVelocity: number;
  /** density x meanVelocity, cars per cell per tick */
  flow: number;
  stoppedCars: number;
  crashedCars: number;
  lanes: LaneMetrics[];
}
