import type { RoadSnapshot } from '@shared/types/simulation.types.ts';

interface StateHistoryOptions {
  maxEntries?: number;
}

/**
 * Bounded buffer of recent road snapshots, oldest first.
 */
export class StateHistory {
  private readonly maxEntries: number;
  private readonly snapshots: RoadSnapshot[] = [];

  constructor(options: StateHistoryOptions = {}) {
    this.maxEntries = options.maxEntries ?? 600; // one minute at 10 Hz
  }

  get size(): number {
    return this.snapshots.length;
  }

  record(snapshot: RoadSnapshot): void {
    this.snapshots.push(structuredClone(snapshot));
    while (this.snapshots.length > this.maxEntries) {
      this.snapshots.shift();
    }
  }

  getRecent(limit = 10): RoadSnapshot[] {
    if (limit <= 0) {
      return [];
    }
    return this.snapshots.slice(-limit).map(entry => structuredClone(entry));
  }

  clear(): void {
    this.snapshots.length = 0;
  }
}
