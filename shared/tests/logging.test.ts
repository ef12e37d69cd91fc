import { describe, expect, it, vi } from 'vitest';
import { createLogger } from '../logging/Logger.ts';
import { LogLevel, parseLogLevel } from '../logging/LogLevel.ts';
import { getLogger, setLogger } from '../logging/sharedLogger.ts';
import { ConsoleTransport } from '../logging/transports/ConsoleTransport.ts';
import { MemoryTransport } from '../logging/transports/MemoryTransport.ts';
import type { LogEntry, LogTransport } from '../logging/types.ts';

function memoryLogger(minLevel = LogLevel.TRACE) {
  const memory = new MemoryTransport();
  const logger = createLogger({ env: 'engine', minLevel, transports: [memory] });
  return { logger, memory };
}

describe('Logger', () => {
  it('drops entries below the minimum level', () => {
    const { logger, memory } = memoryLogger(LogLevel.WARN);
    logger.info('ignored');
    logger.warn('kept');

    expect(memory.getEntries().map(entry => entry.message)).toEqual(['kept']);
  });

  it('is silent at SILENT', () => {
    const { logger, memory } = memoryLogger(LogLevel.SILENT);
    logger.fatal('nothing');

    expect(memory.getEntries()).toEqual([]);
    expect(logger.isLevelEnabled(LogLevel.SILENT)).toBe(false);
  });

  it('merges child context and lifts the category out of it', () => {
    const { logger, memory } = memoryLogger();
    logger.forCategory('CRASH').forLane(2).withTick(7).info('Crash injected', { position: 41 });

    const [entry] = memory.getEntries();
    expect(entry.category).toBe('CRASH');
    expect(entry.env).toBe('engine');
    expect(entry.levelName).toBe('INFO');
    expect(entry.context).toEqual({ laneIndex: 2, tick: 7, position: 41 });
  });

  it('moves an error into the stack field', () => {
    const { logger, memory } = memoryLogger();
    const failure = new Error('boom');
    logger.logError('Listener failed', failure, { tick: 3 });

    const [entry] = memory.getEntries();
    expect(entry.level).toBe(LogLevel.ERROR);
    expect(entry.stack).toBe(failure.stack);
    expect(entry.context).toEqual({ tick: 3, errorMessage: 'boom', errorName: 'Error' });
  });

  it('keeps logging when a transport throws', () => {
    const broken: LogTransport = {
      name: 'broken',
      minLevel: LogLevel.TRACE,
      write: () => {
        throw new Error('disk full');
      },
    };
    const memory = new MemoryTransport();
    const logger = createLogger({ env: 'server', minLevel: LogLevel.TRACE, transports: [broken, memory] });
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.info('still delivered');

    expect(memory.getEntries()).toHaveLength(1);
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('applies level changes to existing children', () => {
    const { logger, memory } = memoryLogger(LogLevel.INFO);
    const child = logger.forCategory('SIMULATION');
    logger.setMinLevel(LogLevel.ERROR);
    child.warn('dropped');

    expect(memory.getEntries()).toEqual([]);
  });
});

describe('parseLogLevel', () => {
  it('parses names case-insensitively', () => {
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel(' Trace ')).toBe(LogLevel.TRACE);
  });

  it('falls back for unknown names', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose', LogLevel.DEBUG)).toBe(LogLevel.DEBUG);
  });
});

describe('transports', () => {
  const entry: LogEntry = {
    timestamp: '2024-01-01T12:00:01.250Z',
    level: LogLevel.INFO,
    levelName: 'INFO',
    category: 'CRASH',
    message: 'Crash injected',
    context: { laneIndex: 2, position: 41 },
    env: 'engine',
  };

  it('formats a single console line', () => {
    const transport = new ConsoleTransport({ useColors: false });
    expect(transport.format(entry)).toBe('12:00:01.250 [INF] CRSH Crash injected {laneIndex=2, position=41}');
  });

  it('can omit the timestamp and context', () => {
    const transport = new ConsoleTransport({ useColors: false, showTimestamp: false, showContext: false });
    expect(transport.format(entry)).toBe('[INF] CRSH Crash injected');
  });

  it('keeps only the newest entries in memory', () => {
    const memory = new MemoryTransport({ maxEntries: 2 });
    memory.write({ ...entry, message: 'first' });
    memory.write({ ...entry, message: 'second' });
    memory.write({ ...entry, message: 'third', category: 'LANE_CHANGE' });

    expect(memory.getEntries().map(e => e.message)).toEqual(['second', 'third']);
    expect(memory.getEntries('LANE_CHANGE')).toHaveLength(1);
    memory.clear();
    expect(memory.getEntries()).toEqual([]);
  });
});

describe('shared logger', () => {
  it('can be replaced', () => {
    const previous = getLogger();
    const { logger } = memoryLogger();
    setLogger(logger);

    expect(getLogger()).toBe(logger);
    setLogger(previous);
  });
});
