/**
 * Monotonic clock for per-stage latency of the frame pipeline.
 */

export interface StageTiming {
  stage: string;
  durationMs: number;
}

export interface StageStats {
  count: number;
  avgMs: number;
  p50Ms: number;
  p95Ms: number;
  maxMs: number;
}

export class PerformanceClock {
  private timings: StageTiming[] = [];

  constructor(private readonly maxSamples: number = 1000) {}

  now(): number {
    return performance.now();
  }

  async measureAsync<T>(operation: () => Promise<T>, stage: string): Promise<{ result: T; durationMs: number }> {
    const start = this.now();
    const result = await operation();
    const durationMs = this.now() - start;

    this.timings.push({ stage, durationMs });
    if (this.timings.length > this.maxSamples) {
      this.timings.shift();
    }
    return { result, durationMs };
  }

  getStats(stage?: string): StageStats {
    const durations = this.timings
      .filter((t) => stage === undefined || t.stage === stage)
      .map((t) => t.durationMs)
      .sort((a, b) => a - b);

    if (durations.length === 0) {
      return { count: 0, avgMs: 0, p50Ms: 0, p95Ms: 0, maxMs: 0 };
    }

    const total = durations.reduce((sum, d) => sum + d, 0);
    return {
      count: durations.length,
      avgMs: total / durations.length,
      p50Ms: durations[Math.floor(durations.length * 0.5)],
      p95Ms: durations[Math.floor(durations.length * 0.95)],
      maxMs: durations[durations.length - 1],
    };
  }
}
