/**
 * Observability layer exports for metrics and logging
 */

// Metrics exports
export {
  type MetricsCollector,
  type MetricsSnapshot,
  type StreamStatus,
  InMemoryMetricsCollector,
  StreamMetrics,
  NoopMetricsCollector,
  MetricNames,
} from './metrics.js';

// Logging exports
export {
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
  type Logger,
  type LogContext,
  type LogRecord,
  createDefaultLoggingConfig,
  formatLogLine,
  ConsoleLogger,
  NoopLogger,
  logStreamStart,
  logStreamEnd,
  logError,
} from './logging.js';
