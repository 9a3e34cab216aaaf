/**
 * Metrics collection for the Firebase client.
 */

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Standard metric names.
 */
export const MetricNames = {
  /** Requests sent through the dispatcher */
  REQUESTS_TOTAL: 'firebase_requests_total',
  /** Requests that produced a successful result */
  REQUESTS_SUCCESS: 'firebase_requests_success',
  /** Requests that produced an error result */
  REQUESTS_FAILED: 'firebase_requests_failed',
  /** Request latency in seconds */
  REQUEST_LATENCY: 'firebase_request_latency_seconds',
  /** Conditional writes rejected by a concurrent writer */
  ATOMIC_CONFLICTS: 'firebase_atomic_conflicts',
  /** Atomic updates refused by a bound */
  ATOMIC_LIMIT_EXCEEDED: 'firebase_atomic_limit_exceeded',
  /** Events delivered to stream consumers */
  EVENTS_RECEIVED: 'firebase_events_received',
  /** Events filtered out (comments, keep-alives) */
  EVENTS_DROPPED: 'firebase_events_dropped',
  /** Streams terminated by an error */
  STREAM_ERRORS: 'firebase_stream_errors',
} as const;

/**
 * No-op metrics collector.
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(): void { /* noop */ }
  recordHistogram(): void { /* noop */ }
}

/**
 * In-memory metrics collector for testing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: Record<string, string>): number[] {
    return this.histograms.get(this.makeKey(name, labels)) ?? [];
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(',');
    return `${name}{${labelStr}}`;
  }
}
