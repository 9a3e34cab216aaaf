export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  redactUrl,
  redactSensitive,
} from './logging.js';
export type { Logger, LogEntry } from './logging.js';

export {
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
} from './metrics.js';
export type { MetricsCollector } from './metrics.js';
