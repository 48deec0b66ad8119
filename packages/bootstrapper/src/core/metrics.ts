export type Clock = () => number;

export class Metrics {
  private metrics: Map<string, number> = new Map();
  private readonly startTime: number;

  constructor(private readonly now: Clock = Date.now) {
    this.startTime = now();
  }

  increment(metric: string, value: number = 1) {
    const current = this.metrics.get(metric) || 0;
    this.metrics.set(metric, current + value);
  }

  timing(metric: string, durationMs: number) {
    const sumKey = `${metric}_sum`;
    const countKey = `${metric}_count`;
    this.increment(sumKey, durationMs);
    this.increment(countKey, 1);
  }

  async time<T>(metric: string, fn: () => Promise<T>): Promise<T> {
    const start = this.now();
    try {
      return await fn();
    } finally {
      this.timing(metric, this.now() - start);
    }
  }

  getSnapshot(): Record<string, number> {
    const elapsed = (this.now() - this.startTime) / 1000;

    return {
      ...Object.fromEntries(this.metrics),
      uptime_sec: elapsed,
    };
  }
}
