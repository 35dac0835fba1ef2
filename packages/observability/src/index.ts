export { log, setLogSink, type LogEntry, type LogLevel, type LogSink } from './logger.js';
export { createServiceMetrics, metricPrefix, type ServiceMetrics } from './metrics.js';
export {
  createServiceLogger,
  redactMetadata,
  type ExtendedLogLevel,
  type ServiceLogger,
  type ServiceLoggerConfig
} from './service-logger.js';
