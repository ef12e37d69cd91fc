import type { TickMetrics } from '../simulation/SimulationLoop.js';

export interface TelemetrySample extends TickMetrics {
  /** Bytes of the state-update broadcast for this tick (0 when nobody listened) */
  deltaBytes: number;
}

export interface TelemetrySummary {
  totalTicks: number;
  avgTickMs: number;
  p95TickMs: number;
  maxTickMs: number;
  avgDeltaBytes: number;
  avgCars: number;
  avgLaneChanges: number;
  lastSample: TelemetrySample | null;
}

interface SimulationTelemetryOptions {
  /** Samples kept for the rolling summary (default: 600) */
  maxSamples?: number;
}

/**
 * Rolling tick timings and broadcast sizes, keyed by tick. Tick metrics and
 * broadcasts for the same tick may arrive in either order.
 */
export class SimulationTelemetry {
  private readonly maxSamples: number;
  private readonly samples = new Map<number, TelemetrySample>();

  constructor(options: SimulationTelemetryOptions = {}) {
    this.maxSamples = options.maxSamples ?? 600;
  }

  noteTickMetrics(metrics: TickMetrics): void {
    const sample = this.sampleFor(metrics.tick);
    Object.assign(sample, metrics);
  }

  noteBroadcast(tick: number, deltaBytes: number): void {
    this.sampleFor(tick).deltaBytes = deltaBytes;
  }

  getSummary(): TelemetrySummary {
    const samples = [...this.samples.values()];
    const durations = samples.map(sample => sample.durationMs);

    return {
      totalTicks: samples.length,
      avgTickMs: average(durations),
      p95TickMs: percentile(durations, 95),
      maxTickMs: durations.length > 0 ? Math.max(...durations) : 0,
      avgDeltaBytes: average(samples.map(sample => sample.deltaBytes)),
      avgCars: average(samples.map(sample => sample.carCount)),
      avgLaneChanges: average(samples.map(sample => sample.laneChanges)),
      lastSample: samples.length > 0 ? { ...samples[samples.length - 1] } : null,
    } satisfies TelemetrySummary;
  }

  getRecent(limit = 120): TelemetrySample[] {
    if (limit <= 0) {
      return [];
    }
    return [...this.samples.values()].slice(-limit).map(sample => ({ ...sample }));
  }

  private sampleFor(tick: number): TelemetrySample {
    let sample = this.samples.get(tick);
    if (!sample) {
      sample = {
        tick,
        timestamp: Date.now(),
        durationMs: 0,
        carCount: 0,
        laneChanges: 0,
        deltaBytes: 0,
      } satisfies TelemetrySample;
      this.samples.set(tick, sample);
      // Map iteration order is insertion order, so the first key is the oldest
      while (this.samples.size > this.maxSamples) {
        const oldest = this.samples.keys().next();
        if (oldest.done) break;
        this.samples.delete(oldest.value);
      }
    }
    return sample;
  }
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function percentile(values: number[], percentileValue: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(sorted.length - 1, Math.floor((percentileValue / 100) * (sorted.length - 1)));
  return sorted[index];
}
