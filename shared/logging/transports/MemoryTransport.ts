import { LogLevel } from '../LogLevel.ts';
import type { LogCategory, LogEntry, LogTransport } from '../types.ts';

export interface MemoryTransportOptions {
  minLevel?: LogLevel;
  /** Oldest entries are dropped beyond this count (default: 1000) */
  maxEntries?: number;
}

/**
 * Memory Transport - keeps entries in an array for inspection by tests and
 * diagnostics endpoints.
 */
export class MemoryTransport implements LogTransport {
  name = 'memory';
  minLevel: LogLevel;

  private readonly maxEntries: number;
  private entries: LogEntry[] = [];

  constructor(options: MemoryTransportOptions = {}) {
    this.minLevel = options.minLevel ?? LogLevel.TRACE;
    this.maxEntries = options.maxEntries ?? 1000;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
  }

  getEntries(category?: LogCategory): LogEntry[] {
    return category ? this.entries.filter(entry => entry.category === category) : [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}
