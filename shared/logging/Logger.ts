import { LogLevel, LOG_LEVEL_NAMES } from './LogLevel.ts';
import type { LogCategory, LogContext, LogEntry, LogEnvironment, LogTransport, LoggerConfig } from './types.ts';

/**
 * Structured logger shared by the engine and the server
 *
 * - Levels TRACE..FATAL, SILENT to mute
 * - Categories as namespaces (SIMULATION, CRASH, LANE_CHANGE, ...)
 * - Child loggers carry extra context (tick, laneIndex, ...)
 * - Pluggable transports (console, memory)
 */
export class Logger {
  private config: LoggerConfig;
  private childContext: LogContext;

  constructor(config: LoggerConfig, childContext: LogContext = {}) {
    this.config = config;
    this.childContext = childContext;
  }

  /**
   * Create a child logger with additional context. Children share the
   * parent's config, so level and transport changes apply to both.
   */
  child(context: LogContext): Logger {
    return new Logger(this.config, {
      ...this.childContext,
      ...context,
    });
  }

  forCategory(category: LogCategory): Logger {
    return this.child({ category });
  }

  forLane(laneIndex: number): Logger {
    return this.child({ laneIndex });
  }

  withTick(tick: number): Logger {
    return this.child({ tick });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel && level !== LogLevel.SILENT;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      levelName: LOG_LEVEL_NAMES[level],
      category: context?.category ?? this.childContext.category ?? this.config.defaultCategory,
      message,
      env: this.config.env,
    };

    const mergedContext: LogContext = {
      ...this.childContext,
      ...context,
    };
    delete mergedContext.category;

    if (mergedContext.error instanceof Error) {
      entry.stack = mergedContext.error.stack;
      delete mergedContext.error;
    }

    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext;
    }

    for (const transport of this.config.transports) {
      if (level >= transport.minLevel) {
        try {
          transport.write(entry);
        } catch (err) {
          // Fallback to console if transport fails
          console.error(`[Logger] Transport "${transport.name}" failed:`, err);
        }
      }
    }
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log(LogLevel.FATAL, message, context);
  }

  /**
   * Log an error with its stack trace
   */
  logError(message: string, error: Error, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, {
      ...context,
      error,
      errorMessage: error.message,
      errorName: error.name,
    });
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }
}

export function createLogger(options: {
  env: LogEnvironment;
  minLevel?: LogLevel;
  defaultCategory?: LogCategory;
  transports?: LogTransport[];
}): Logger {
  return new Logger({
    env: options.env,
    minLevel: options.minLevel ?? LogLevel.INFO,
    defaultCategory: options.defaultCategory ?? 'GENERAL',
    transports: options.transports ?? [],
  });
}
