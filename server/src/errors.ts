import { EmptyLaneError, RoadConfigError, SimulationError } from '@shared/engine/errors.ts';

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR'
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/**
 * Engine errors surfaced through the HTTP API.
 */
export function fromSimulationError(error: SimulationError): AppError {
  if (error instanceof EmptyLaneError) {
    return new ConflictError(error.message);
  }
  if (error instanceof RoadConfigError) {
    return new ValidationError(error.message);
  }
  return new AppError(error.message, 500, error.code);
}
