/**
 * Provisioning: Health Monitor
 *
 * Failure-ratio circuit breaker consulted by the runner before each dispatch.
 */

export type HealthMonitorOptions = {
  /** Failure ratio that must be exceeded to trip. */
  threshold?: number;
  /** Completions required before the ratio is evaluated. */
  minSamples?: number;
};

export type HealthSnapshot = {
  total: number;
  failures: number;
  failureRatio: number;
  open: boolean;
};

export class HealthMonitor {
  readonly threshold: number;
  readonly minSamples: number;
  private total = 0;
  private failures = 0;

  constructor(options?: HealthMonitorOptions) {
    this.threshold = options?.threshold ?? 0.3;
    this.minSamples = options?.minSamples ?? 10;
  }

  observe(success: boolean): void {
    this.total++;
    if (!success) this.failures++;
  }

  shouldHalt(): boolean {
    if (this.total < this.minSamples || this.total === 0) return false;
    return this.failures / this.total > this.threshold;
  }

  reset(): void {
    this.total = 0;
    this.failures = 0;
  }

  snapshot(): HealthSnapshot {
    return {
      total: this.total,
      failures: this.failures,
      failureRatio: this.total === 0 ? 0 : this.failures / this.total,
      open: this.shouldHalt(),
    };
  }
}
