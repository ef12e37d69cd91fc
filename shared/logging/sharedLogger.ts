/**
 * Shared Logger Instance
 *
 * Lazy default logger for engine code that is not handed one explicitly.
 * Level comes from LOG_LEVEL (default INFO).
 */

import { Logger, createLogger } from './Logger.ts';
import { parseLogLevel } from './LogLevel.ts';
import { ConsoleTransport } from './transports/ConsoleTransport.ts';

let _logger: Logger | null = null;

function initializeLogger(): Logger {
  const logLevel = parseLogLevel(process.env.LOG_LEVEL ?? 'INFO');

  return createLogger({
    env: 'engine',
    minLevel: logLevel,
    defaultCategory: 'GENERAL',
    transports: [new ConsoleTransport({ minLevel: logLevel })],
  });
}

export function getLogger(): Logger {
  if (!_logger) {
    _logger = initializeLogger();
  }
  return _logger;
}

/**
 * Replace the shared logger (the server installs its own at startup)
 */
export function setLogger(logger: Logger): void {
  _logger = logger;
}
