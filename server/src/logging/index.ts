/**
 * Server-Side Logger Configuration
 *
 * Creates the server's logger and installs it as the shared default, so the
 * engine's crash and lane-change records go through the same transports.
 */

import { createLogger, parseLogLevel, setLogger } from '@shared/logging/index.ts';
import { ConsoleTransport } from '@shared/logging/transports/ConsoleTransport.ts';

const LOG_LEVEL = parseLogLevel(process.env.LOG_LEVEL ?? 'DEBUG');

/**
 * Main server logger instance
 *
 * @example
 * ```typescript
 * import { logger } from './logging/index.js';
 *
 * logger.info('Server started', { category: 'SYSTEM', port: 4000 });
 * logger.forCategory('SIMULATION').withTick(12).debug('Tick complete');
 * ```
 */
export const logger = createLogger({
  env: 'server',
  minLevel: LOG_LEVEL,
  defaultCategory: 'GENERAL',
  transports: [
    new ConsoleTransport({
      minLevel: LOG_LEVEL,
      showTimestamp: true,
      showContext: true,
    }),
  ],
});

setLogger(logger);

// Pre-created category loggers for convenience
export const simulationLogger = logger.forCategory('SIMULATION');
export const websocketLogger = logger.forCategory('WEBSOCKET');
export const systemLogger = logger.forCategory('SYSTEM');
export const configLogger = logger.forCategory('CONFIG');
export const perfLogger = logger.forCategory('PERF');

systemLogger.debug('Server logger initialized', { logLevel: LOG_LEVEL });

export default logger;
