export { deny, errorEnvelope, type ErrorEnvelope } from './errors.js';
export { registerServiceMetrics } from './metrics.js';
export { parseHost, parsePort, runService, runServiceAndExit, type ServiceBootstrapOptions } from './bootstrap.js';
