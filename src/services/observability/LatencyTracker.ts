export class LatencyTracker {
  private readonly measurements = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  async measure<T>(name: string, operation: () => Promise<T>): Promise<T> {
    const startedAt = this.now();
    try {
      return await operation();
    } finally {
      this.record(name, this.now() - startedAt);
    }
  }

  record(name: string, durationMs: number): void {
    this.measurements.set(name, Math.max(0, durationMs));
  }

  get(name: string): number | undefined {
    return this.measurements.get(name);
  }

  getAll(): Record<string, number> {
    return Object.fromEntries(this.measurements);
  }

  /** Sum of all recorded stages; exceeds wall time when stages overlap. */
  total(): number {
    let sum = 0;
    for (const value of this.measurements.values()) sum += value;
    return sum;
  }
}
