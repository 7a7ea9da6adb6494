import { IMetricsCollector, CacheMetrics } from '../types';

/** Counters behind CacheManager.getMetrics(). A disabled collector records nothing. */
export class MetricsCollector implements IMetricsCollector {
  private hits = 0;
  private misses = 0;
  private operations = 0;
  private errors = 0;
  private totalResponseTime = 0;

  constructor(private enabled = true) {}

  recordHit(): void {
    if (this.enabled) this.hits++;
  }

  recordMiss(): void {
    if (this.enabled) this.misses++;
  }

  recordOperation(duration: number): void {
    if (!this.enabled) return;
    this.operations++;
    this.totalResponseTime += duration;
  }

  recordError(): void {
    if (this.enabled) this.errors++;
  }

  /** Times the operation and counts it, as an error too when it rejects. */
  async withMetrics<T>(operation: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      return await operation();
    } catch (error) {
      this.recordError();
      throw error;
    } finally {
      this.recordOperation(Date.now() - startedAt);
    }
  }

  getMetrics(): CacheMetrics {
    const lookups = this.hits + this.misses;
    const round = (n: number): number => Math.round(n * 100) / 100;

    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? round((this.hits / lookups) * 100) : 0,
      avgResponseTime: this.operations > 0 ? round(this.totalResponseTime / this.operations) : 0,
      operations: this.operations,
      errors: this.errors,
    };
  }

  reset(): void {
    this.hits = 0;
    this.misses = 0;
    this.operations = 0;
    this.errors = 0;
    this.totalResponseTime = 0;
  }
}
