import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface ServiceMetrics {
  registry: Registry;
  requestDurationMs: Histogram<'method' | 'route' | 'status'>;
  requestCount: Counter<'method' | 'route' | 'status'>;
  errorCount: Counter<'code'>;
  versionResolutionCount: Counter<'version' | 'match' | 'status'>;
  versionErrorCount: Counter<'code'>;
  buildInfo: Gauge<'release_id' | 'git_sha' | 'environment'>;
}

export function metricPrefix(serviceName: string): string {
  return serviceName.replace(/[^A-Za-z0-9_]/g, '_');
}

export function createServiceMetrics(serviceName: string): ServiceMetrics {
  const registry = new Registry();
  const prefix = metricPrefix(serviceName);

  const requestDurationMs = new Histogram({
    name: `${prefix}_request_duration_ms`,
    help: 'Request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [5, 10, 25, 50, 100, 250, 500, 1000],
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
    help: 'Total error responses by status code',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  const versionResolutionCount = new Counter({
    name: `${prefix}_version_resolution_total`,
    help: 'Resolved API versions by negotiation outcome and lifecycle status',
    labelNames: ['version', 'match', 'status'] as const,
    registers: [registry]
  });

  const versionErrorCount = new Counter({
    name: `${prefix}_version_error_total`,
    help: 'Rejected version resolutions by error code',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  const buildInfo = new Gauge({
    name: `${prefix}_build_info`,
    help: 'Build metadata for this running service',
    labelNames: ['release_id', 'git_sha', 'environment'] as const,
    registers: [registry]
  });

  buildInfo
    .labels(
      process.env.RELEASE_ID ?? 'dev',
      process.env.GIT_SHA ?? 'local',
      process.env.ENVIRONMENT ?? process.env.NODE_ENV ?? 'development'
    )
    .set(1);

  return {
    registry,
    requestDurationMs,
    requestCount,
    errorCount,
    versionResolutionCount,
    versionErrorCount,
    buildInfo
  };
}
