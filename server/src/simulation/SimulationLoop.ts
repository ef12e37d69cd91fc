import { performance } from 'node:perf_hooks';
import type { RoadSnapshot } from '@shared/types/simulation.types.ts';
import type { TrafficSimulation } from './TrafficSimulation.js';
import { simulationLogger, perfLogger } from '../logging/index.js';

export interface SimulationLoopOptions {
  tickRate?: number;
  /** Monotonic clock in ms (default: performance.now) */
  now?: () => number;
}

export type SnapshotListener = (snapshot: RoadSnapshot) => void;
export interface TickMetrics {
  tick: number;
  timestamp: number;
  durationMs: number;
  carCount: number;
  laneChanges: number;
}

// 100 ms per tick
const DEFAULT_TICK_RATE = 10; // Hz

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class SimulationLoop {
  private readonly simulation: TrafficSimulation;
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private nextTickTarget = 0;
  private lastSnapshot: RoadSnapshot | null = null;
  private listeners = new Set<SnapshotListener>();
  private metricListeners = new Set<(metrics: TickMetrics) => void>();

  constructor(simulation: TrafficSimulation, options: SimulationLoopOptions = {}) {
    const tickRate = options.tickRate ?? DEFAULT_TICK_RATE;
    this.simulation = simulation;
    this.tickIntervalMs = 1000 / tickRate;
    this.now = options.now ?? (() => performance.now());
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.nextTickTarget = this.now();
    simulationLogger.info('Simulation loop started', { tickIntervalMs: this.tickIntervalMs });
    this.scheduleNext();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    simulationLogger.info('Simulation loop stopped', { tick: this.lastSnapshot?.tick ?? 0 });
  }

  onSnapshot(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onTickMetrics(listener: (metrics: TickMetrics) => void): () => void {
    this.metricListeners.add(listener);
    return () => {
      this.metricListeners.delete(listener);
    };
  }

  /**
   * Latest published snapshot, or the current state when no tick ran yet.
   */
  getLatestSnapshot(): RoadSnapshot {
    if (!this.lastSnapshot) {
      this.lastSnapshot = this.simulation.snapshot(Date.now());
    }
    return this.lastSnapshot;
  }

  private scheduleNext(): void {
    if (!this.running) return;

    const now = this.now();

    if (now >= this.nextTickTarget) {
      this.runTick();
      this.nextTickTarget += this.tickIntervalMs;
      // Fell far behind: skip ahead instead of bursting
      if (now - this.nextTickTarget > this.tickIntervalMs) {
        this.nextTickTarget = now + this.tickIntervalMs;
      }
    }

    const delay = Math.max(0, this.nextTickTarget - this.now());
    this.timer = setTimeout(() => this.scheduleNext(), delay);
  }

  private runTick(): void {
    const timestamp = Date.now();
    const tickStart = this.now();
    const snapshot = this.simulation.step(timestamp);
    const durationMs = this.now() - tickStart;
    this.lastSnapshot = snapshot;

    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        simulationLogger.logError('Snapshot listener error', asError(error), { tick: snapshot.tick });
      }
    }

    const metrics: TickMetrics = {
      tick: snapshot.tick,
      timestamp,
      durationMs,
      carCount: snapshot.laneCounts.reduce((sum, count) => sum + count, 0),
      laneChanges: this.simulation.getLastSummary()?.laneChanges ?? 0,
    };

    for (const listener of this.metricListeners) {
      try {
        listener(metrics);
      } catch (error) {
        perfLogger.logError('Metrics listener error', asError(error), { tick: snapshot.tick });
      }
    }
  }
}
