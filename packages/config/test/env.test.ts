import { describe, expect, it } from 'vitest';
import { loadVersioningEnv, loadVersioningOptions } from '../src/env.js';
import { loadAccountsApiServiceEnv } from '../src/service-env.js';

describe('loadVersioningOptions', () => {
  it('derives URL and header strategies by default', () => {
    expect(loadVersioningOptions({})).toEqual({
      format: 'semantic',
      strategies: [
        { kind: 'url_path', priority: 10, prefix: 'v', apiPrefix: undefined },
        { kind: 'header', priority: 20, header: 'x-api-version', alternatives: [] }
      ],
      defaultVersion: null,
      strictVersioning: false,
      compatibility: {},
      deprecationHeaders: {}
    });
  });

  it('turns the configured strategy order into priorities', () => {
    const options = loadVersioningOptions({
      API_VERSION_STRATEGIES: 'query_param, accept_header ,header',
      API_VERSION_QUERY_PARAM: 'api-version',
      API_VERSION_HEADER_ALTERNATIVES: 'accept-version, api-version',
      API_VERSION_ACCEPT_VENDOR: 'true'
    });

    expect(options.strategies).toEqual([
      { kind: 'query_param', priority: 10, param: 'api-version' },
      { kind: 'accept_header', priority: 20, vendorPattern: true },
      { kind: 'header', priority: 30, header: 'x-api-version', alternatives: ['accept-version', 'api-version'] }
    ]);
  });

  it('reads the default version, strict flag and compatibility matrix', () => {
    const options = loadVersioningOptions({
      API_VERSION_FORMAT: 'simple',
      API_DEFAULT_VERSION: '2.0',
      API_STRICT_VERSIONING: 'true',
      API_COMPATIBILITY: '{"2.5":["2.1","2.0"]}'
    });

    expect(options).toMatchObject({
      format: 'simple',
      defaultVersion: '2.0',
      strictVersioning: true,
      compatibility: { '2.5': ['2.1', '2.0'] }
    });
  });

  it('treats blank values as unset', () => {
    expect(loadVersioningEnv({ API_DEFAULT_VERSION: '  ', API_COMPATIBILITY: '' })).toMatchObject({
      API_DEFAULT_VERSION: undefined,
      API_COMPATIBILITY: {}
    });
  });

  it('rejects malformed values', () => {
    expect(() => loadVersioningEnv({ API_COMPATIBILITY: '{not json' })).toThrow(/API_COMPATIBILITY must be valid JSON/);
    expect(() => loadVersioningEnv({ API_VERSION_STRATEGIES: 'url_path,cookie' })).toThrow();
    expect(() => loadVersioningEnv({ API_STRICT_VERSIONING: 'yes' })).toThrow();
    expect(() => loadVersioningOptions({ API_VERSION_FORMAT: 'date', API_DEFAULT_VERSION: '2.0' })).toThrow(
      "'2.0' is not a valid date version."
    );
  });
});

describe('loadAccountsApiServiceEnv', () => {
  it('applies defaults', () => {
    expect(loadAccountsApiServiceEnv({})).toEqual({
      ACCOUNTS_API_HOST: '0.0.0.0',
      ACCOUNTS_API_PORT: 3000,
      API_ENFORCE_SUNSET: false,
      API_DISCOVERY_PATH: '/versions',
      LOG_LEVEL: undefined
    });
  });

  it('coerces numbers and flags', () => {
    const env = loadAccountsApiServiceEnv({ ACCOUNTS_API_PORT: '8080', API_ENFORCE_SUNSET: 'true', API_DISCOVERY_PATH: '/meta/versions' });

    expect(env.ACCOUNTS_API_PORT).toBe(8080);
    expect(env.API_ENFORCE_SUNSET).toBe(true);
    expect(env.API_DISCOVERY_PATH).toBe('/meta/versions');
  });

  it('rejects out-of-range ports', () => {
    expect(() => loadAccountsApiServiceEnv({ ACCOUNTS_API_PORT: '70000' })).toThrow();
  });
});
