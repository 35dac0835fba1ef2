import { afterEach, describe, expect, it } from 'vitest';
import { log, setLogSink, type LogEntry } from '../src/logger.js';
import { createServiceMetrics, metricPrefix } from '../src/metrics.js';
import { createServiceLogger, redactMetadata } from '../src/service-logger.js';

function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogSink((line) => {
    entries.push(JSON.parse(line));
  });
  return entries;
}

afterEach(() => {
  setLogSink(null);
});

describe('log', () => {
  it('writes one JSON line per entry', () => {
    const entries = captureLogs();

    log('warn', 'Deprecated API version accessed', { version: '1.0' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'warn', message: 'Deprecated API version accessed', metadata: { version: '1.0' } });
    expect(Number.isNaN(Date.parse(entries[0]?.timestamp ?? ''))).toBe(false);
  });
});

describe('createServiceLogger', () => {
  it('adds the service name to call metadata', () => {
    const entries = captureLogs();
    const logger = createServiceLogger({ service: 'accounts-api', minLevel: 'info' });

    logger.info('resolved', { requestId: 'req-1', version: '2.0' });
    logger.info('resolved', { requestId: 'req-2', version: '1.0' });

    expect(entries.map((entry) => entry.metadata)).toEqual([
      { service: 'accounts-api', requestId: 'req-1', version: '2.0' },
      { service: 'accounts-api', requestId: 'req-2', version: '1.0' }
    ]);
  });

  it('drops entries below the minimum level', () => {
    const entries = captureLogs();
    const logger = createServiceLogger({ service: 'accounts-api', minLevel: 'warn' });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');

    expect(entries.map((entry) => entry.message)).toEqual(['kept']);
  });

  it('routes debug entries through the info channel', () => {
    const entries = captureLogs();
    createServiceLogger({ service: 'accounts-api', minLevel: 'debug' }).debug('trace');

    expect(entries[0]?.level).toBe('info');
  });
});

describe('redactMetadata', () => {
  it('masks sensitive keys at any depth', () => {
    expect(redactMetadata({ headers: { Authorization: 'Bearer test-token', accept: 'application/json' }, apiKey: 'test-key' })).toEqual({
      headers: { Authorization: '[REDACTED]', accept: 'application/json' },
      apiKey: '[REDACTED]'
    });
  });
});

describe('createServiceMetrics', () => {
  it('derives metric names from the service name', () => {
    expect(metricPrefix('accounts-api')).toBe('accounts_api');
  });

  it('counts version resolutions by label', async () => {
    const metrics = createServiceMetrics('accounts-api');
    metrics.versionResolutionCount.labels('1.0', 'exact', 'deprecated').inc();
    metrics.versionResolutionCount.labels('1.0', 'exact', 'deprecated').inc();

    const snapshot = await metrics.versionResolutionCount.get();

    expect(snapshot.name).toBe('accounts_api_version_resolution_total');
    expect(snapshot.values).toHaveLength(1);
    expect(snapshot.values[0]).toMatchObject({ value: 2, labels: { version: '1.0', match: 'exact', status: 'deprecated' } });
  });

  it('keeps registries separate per call', async () => {
    const first = createServiceMetrics('accounts-api');
    const second = createServiceMetrics('accounts-api');
    first.versionErrorCount.labels('UNSUPPORTED_VERSION').inc();

    expect(await second.registry.getSingleMetricAsString('accounts_api_version_error_total')).not.toContain('UNSUPPORTED_VERSION');
  });
});
