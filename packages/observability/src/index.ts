export { log, type LogLevel } from './logger.js';
export { createServiceLogger, redactMetadata, type ServiceLogger, type ServiceLoggerConfig } from './service-logger.js';
export { createServiceMetrics, type ConversionOutcomeLabel, type ServiceMetrics } from './metrics.js';
export {
  deepHealthCheck,
  worstStatus,
  type DeepHealthResult,
  type DependencyCheck,
  type DependencyStatus,
  type HealthProbe
} from './health.js';
