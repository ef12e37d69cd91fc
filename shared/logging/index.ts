/**
 * Structured logging for the traffic simulator
 *
 * @example
 * ```typescript
 * import { getLogger } from '@shared/logging/index.ts';
 *
 * const log = getLogger().forCategory('SIMULATION').withTick(42);
 * log.info('Tick complete', { laneChanges: 3 });
 * ```
 */

export { Logger, createLogger } from './Logger.ts';
export { LogLevel, LOG_LEVEL_NAMES, parseLogLevel } from './LogLevel.ts';
export type {
  LogCategory,
  LogContext,
  LogEntry,
  LogEnvironment,
  LogTransport,
  LoggerConfig,
} from './types.ts';

export * from './transports/index.ts';

export { getLogger, setLogger } from './sharedLogger.ts';
