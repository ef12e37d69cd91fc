import { z } from 'zod';
import { CRASH_PROBABILITY, DEFAULT_ROAD } from '@shared/constants/traffic.ts';

const coerceInt = z.coerce.number().int();
const booleanFlag = z.enum(['true', 'false']).transform(value => value === 'true');

const envSchema = z
  .object({
    // Server
    PORT: coerceInt.min(0).max(65535).default(4000),
    HOST: z.string().default('0.0.0.0'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Loop
    TICK_RATE: z.coerce.number().positive().max(1000).default(10),

    // Road
    ROAD_LANES: coerceInt.min(1).default(DEFAULT_ROAD.numLanes),
    ROAD_LENGTH: coerceInt.min(1).default(DEFAULT_ROAD.length),
    CARS_PER_LANE: coerceInt.min(0).default(DEFAULT_ROAD.carsPerLane),
    LANE_CHANGES: booleanFlag.default('true'),
    CRASH_PROBABILITY: z.coerce.number().min(0).max(1).default(CRASH_PROBABILITY),
    SEED: coerceInt.optional(),
  })
  .refine(env => env.CARS_PER_LANE <= env.ROAD_LENGTH, {
    message: 'CARS_PER_LANE must not exceed ROAD_LENGTH',
    path: ['CARS_PER_LANE'],
  });

export type Env = z.infer<typeof envSchema>;

export class InvalidEnvironmentError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'InvalidEnvironmentError';
  }
}

/**
 * Parse and validate server configuration. Throws before anything is built.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new InvalidEnvironmentError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}
