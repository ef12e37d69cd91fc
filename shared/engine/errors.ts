/**
 * Engine error types. All extend SimulationError so callers (the server's
 * error handler in particular) can tell engine faults from everything else.
 */

export class SimulationError extends Error {
  constructor(
    message: string,
    public code: string = 'SIMULATION_ERROR'
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

/** Invalid road construction parameters or lane index */
export class RoadConfigError extends SimulationError {
  constructor(message: string) {
    super(message, 'ROAD_CONFIG');
    this.name = 'RoadConfigError';
  }
}

export class EmptyLaneError extends SimulationError {
  constructor(public laneIndex?: number) {
    super(
      laneIndex === undefined ? 'Lane has no cars' : `Lane ${laneIndex} has no cars`,
      'EMPTY_LANE'
    );
    this.name = 'EmptyLaneError';
  }
}

export class OccupiedCellError extends SimulationError {
  constructor(public position: number) {
    super(`Cell ${position} is already occupied`, 'OCCUPIED_CELL');
    this.name = 'OccupiedCellError';
  }
}
