import { LogLevel } from '../LogLevel.ts';
import type { LogCategory, LogContext, LogEntry, LogTransport } from '../types.ts';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  TRACE: '\x1b[90m',       // Gray
  DEBUG: '\x1b[36m',       // Cyan
  INFO: '\x1b[32m',        // Green
  WARN: '\x1b[33m',        // Yellow
  ERROR: '\x1b[31m',       // Red
  FATAL: '\x1b[35m',       // Magenta

  SIMULATION: '\x1b[94m',  // Light Blue
  LANE_CHANGE: '\x1b[96m', // Light Cyan
  CRASH: '\x1b[91m',       // Light Red
  WEBSOCKET: '\x1b[36m',   // Cyan
  HTTP: '\x1b[96m',        // Light Cyan
  CONFIG: '\x1b[93m',      // Light Yellow
  SYSTEM: '\x1b[97m',      // Bright White
  PERF: '\x1b[93m',        // Light Yellow
  GENERAL: '\x1b[37m',     // White

  RESET: '\x1b[0m',
  BOLD: '\x1b[1m',
  DIM: '\x1b[2m',
  MUTED: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<string, string> = {
  TRACE: COLORS.TRACE,
  DEBUG: COLORS.DEBUG,
  INFO: COLORS.INFO,
  WARN: COLORS.WARN,
  ERROR: COLORS.ERROR,
  FATAL: COLORS.FATAL,
};

const LEVEL_PREFIXES: Record<string, string> = {
  TRACE: '[TRC]',
  DEBUG: '[DBG]',
  INFO:  '[INF]',
  WARN:  '[WRN]',
  ERROR: '[ERR]',
  FATAL: '[FTL]',
};

const CATEGORY_LABELS: Record<LogCategory, string> = {
  SIMULATION:  'SIM',
  LANE_CHANGE: 'LANE',
  CRASH:       'CRSH',
  WEBSOCKET:   'WS',
  HTTP:        'HTTP',
  CONFIG:      'CFG',
  SYSTEM:      'SYS',
  PERF:        'PERF',
  GENERAL:     'GEN',
};

export interface ConsoleTransportOptions {
  /** ANSI colors (default: true when stdout is a TTY) */
  useColors?: boolean;
  showTimestamp?: boolean;
  showContext?: boolean;
  minLevel?: LogLevel;
}

/**
 * Console Transport - single-line, color-coded terminal output
 *
 *   12:00:01.250 [INF] CRSH Crash injected {laneIndex=2, position=41, tick=88}
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';
  minLevel: LogLevel;

  private options: Required<ConsoleTransportOptions>;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? LogLevel.DEBUG;
    this.options = {
      useColors: options.useColors ?? Boolean(process.stdout.isTTY),
      showTimestamp: options.showTimestamp ?? true,
      showContext: options.showContext ?? true,
      minLevel: this.minLevel,
    };
  }

  write(entry: LogEntry): void {
    const consoleMethod = this.getConsoleMethod(entry.level);
    consoleMethod(this.format(entry));
    if (entry.stack) {
      console.error(this.paint(COLORS.DIM, entry.stack));
    }
  }

  format(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.options.showTimestamp) {
      parts.push(this.paint(COLORS.MUTED, this.formatTimestamp(entry)));
    }

    const levelColor = LEVEL_COLORS[entry.levelName] ?? COLORS.RESET;
    const levelPrefix = LEVEL_PREFIXES[entry.levelName] ?? entry.levelName;
    parts.push(this.paint(levelColor + COLORS.BOLD, levelPrefix));

    const categoryLabel = CATEGORY_LABELS[entry.category] ?? entry.category;
    parts.push(this.paint(COLORS[entry.category], categoryLabel.padEnd(4)));

    parts.push(entry.message);

    if (this.options.showContext && entry.context) {
      const contextStr = this.formatContext(entry.context);
      if (contextStr) {
        parts.push(this.paint(COLORS.MUTED, contextStr));
      }
    }

    return parts.join(' ');
  }

  private paint(color: string, text: string): string {
    return this.options.useColors ? `${color}${text}${COLORS.RESET}` : text;
  }

  // HH:MM:SS.mmm
  private formatTimestamp(entry: LogEntry): string {
    return entry.timestamp.split('T')[1].replace('Z', '');
  }

  private formatContext(context: LogContext): string {
    const pairs = Object.entries(context)
      .filter(([key, value]) => key !== 'category' && value !== undefined)
      .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
    return pairs.length > 0 ? `{${pairs.join(', ')}}` : '';
  }

  private getConsoleMethod(level: LogLevel): typeof console.log {
    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        return console.debug;
      case LogLevel.INFO:
        return console.info;
      case LogLevel.WARN:
        return console.warn;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        return console.error;
      default:
        return console.log;
    }
  }
}
