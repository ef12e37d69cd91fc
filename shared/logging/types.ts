import type { LogLevel } from './LogLevel.ts';

/**
 * Log categories for structured logging namespaces
 */
export type LogCategory =
  | 'SIMULATION'   // Road construction, ticks
  | 'LANE_CHANGE'  // Lane-change transfers between lanes
  | 'CRASH'        // Crash injection
  | 'WEBSOCKET'    // WebSocket connections, messages
  | 'HTTP'         // HTTP requests
  | 'CONFIG'       // Configuration loading
  | 'SYSTEM'       // System-level events
  | 'PERF'         // Performance metrics
  | 'GENERAL';     // General/uncategorized

/**
 * Context information attached to every log entry
 */
export interface LogContext {
  category?: LogCategory;
  /** Current simulation tick */
  tick?: number;
  laneIndex?: number;
  carId?: number;
  /** Cell on the lane */
  position?: number;
  durationMs?: number;
  /** Any additional structured data */
  [key: string]: unknown;
}

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  levelName: string;
  category: LogCategory;
  message: string;
  context?: LogContext;
  /** Error stack trace if applicable */
  stack?: string;
  /** Which side emitted the entry */
  env: LogEnvironment;
}

export type LogEnvironment = 'engine' | 'server';

/**
 * Transport interface - destinations for log output
 */
export interface LogTransport {
  name: string;
  /** Minimum log level this transport handles */
  minLevel: LogLevel;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  /** Logs below this level are dropped before reaching any transport */
  minLevel: LogLevel;
  defaultCategory: LogCategory;
  env: LogEnvironment;
  transports: LogTransport[];
}
