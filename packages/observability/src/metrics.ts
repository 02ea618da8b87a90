import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type ConversionOutcomeLabel = 'success' | 'invalid_amount' | 'unknown_currency' | 'rate_unavailable';

export interface ServiceMetrics {
  registry: Registry;
  requestDurationMs: Histogram<'method' | 'route' | 'status'>;
  requestCount: Counter<'method' | 'route' | 'status'>;
  errorCount: Counter<'code'>;
  conversionCount: Counter<'outcome'>;
  buildInfo: Gauge<'release_id' | 'git_sha' | 'environment'>;
}

export function createServiceMetrics(serviceName: string): ServiceMetrics {
  const registry = new Registry();
  const prefix = serviceName.replaceAll('-', '_');

  const requestDurationMs = new Histogram({
    name: `${prefix}_request_duration_ms`,
    help: 'Request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
    registers: [registry]
  });

  const requestCount = new Counter({
    name: `${prefix}_request_total`,
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [registry]
  });

  const errorCount = new Counter({
    name: `${prefix}_error_total`,
    help: 'Total errors',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  const conversionCount = new Counter({
    name: `${prefix}_conversion_total`,
    help: 'Currency conversions by outcome',
    labelNames: ['outcome'] as const,
    registers: [registry]
  });

  const buildInfo = new Gauge({
    name: `${prefix}_build_info`,
    help: 'Build metadata for this running service',
    labelNames: ['release_id', 'git_sha', 'environment'] as const,
    registers: [registry]
  });

  buildInfo
    .labels(process.env.RELEASE_ID ?? 'dev', process.env.GIT_SHA ?? 'local', process.env.NODE_ENV ?? 'development')
    .set(1);

  return {
    registry,
    requestDurationMs,
    requestCount,
    errorCount,
    conversionCount,
    buildInfo
  };
}
