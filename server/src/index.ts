import { buildServer } from './app.js';
import { InvalidEnvironmentError, loadEnv, type Env } from './config/env.js';
import { configLogger } from './logging/index.js';

function readEnv(): Env {
  try {
    return loadEnv();
  } catch (error) {
    if (error instanceof InvalidEnvironmentError) {
      configLogger.fatal('Invalid environment', { issues: error.issues });
      process.exit(1);
    }
    throw error;
  }
}

async function start() {
  const env = readEnv();

  const server = await buildServer({
    logger: env.NODE_ENV !== 'test',
    tickRate: env.TICK_RATE,
    simulation: {
      numLanes: env.ROAD_LANES,
      length: env.ROAD_LENGTH,
      carsPerLane: env.CARS_PER_LANE,
      laneChanges: env.LANE_CHANGES,
      crashProbability: env.CRASH_PROBABILITY,
      seed: env.SEED,
    },
  });

  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.close();
      server.log.info('Server closed successfully');
      process.exit(0);
    } catch (error) {
      server.log.error(error, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGHUP', () => void shutdown('SIGHUP'));

  try {
    await server.listen({ port: env.PORT, host: env.HOST });
    const displayHost = env.HOST.includes(':') ? `[${env.HOST}]` : env.HOST;
    server.log.info(`Server listening on http://${displayHost}:${env.PORT}`);
    server.simulationLoop.start();
  } catch (error) {
    server.log.error(error);
    process.exit(1);
  }
}

void start();
