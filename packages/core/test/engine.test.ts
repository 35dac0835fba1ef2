import { describe, expect, it } from 'vitest';
import { VersioningEngine, type VersioningOptions } from '../src/engine.js';
import { ConfigurationError, InvalidVersionError, MissingVersionError, RouteNotFoundError, UnsupportedVersionError } from '../src/errors.js';
import { createRequestView } from '../src/request-view.js';
import type { RouteTableBuilder } from '../src/route-table.js';

const now = new Date('2025-06-01T00:00:00.000Z');

function usersRoutes(routes: RouteTableBuilder<string>) {
  routes.add('GET', '/users', '1.0', 'users-v1');
  routes.add('GET', '/users', '2.0', 'users-v2');
  routes.add('GET', '/users/:id', '2.0', 'user-v2');
}

function engine(options: Partial<VersioningOptions> = {}, register = usersRoutes) {
  return VersioningEngine.create<string>(
    {
      format: 'semantic',
      strategies: [{ kind: 'url_path' }, { kind: 'header', priority: 200 }],
      ...options
    },
    register
  );
}

const get = (url: string, headers: Record<string, string> = {}) => createRequestView({ url, method: 'GET', headers });

describe('VersioningEngine.resolve', () => {
  it('dispatches a URL-versioned request to the exact version', () => {
    const result = engine().resolve(get('/v1/users'), now);

    expect(result.version.toString()).toBe('1.0');
    expect(result.requested?.toString()).toBe('1.0');
    expect(result.match).toBe('exact');
    expect(result.handler).toBe('users-v1');
    expect(result.token).toEqual({ value: '1', source: 'path:/v1', strategy: 'url_path' });
    expect(result.deprecation.status).toBe('active');
  });

  it('passes template parameters through', () => {
    const result = engine().resolve(get('/v2/users/42'), now);

    expect(result.template).toBe('/users/:id');
    expect(result.params).toEqual({ id: '42' });
    expect(result.handler).toBe('user-v2');
  });

  it('rejects a version the route does not serve', () => {
    const headerFirst = engine({ strategies: [{ kind: 'header', priority: 1 }, { kind: 'url_path', priority: 2 }] });
    try {
      headerFirst.resolve(get('/v1/users', { 'X-API-Version': '2.5' }), now);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedVersionError);
      expect(error).toMatchObject({ details: { requested: '2.5', available: ['1.0', '2.0'] } });
    }
  });

  it('negotiates through the compatibility matrix', () => {
    const result = engine({ compatibility: { '2.5': ['2.1', '2.0'] } }).resolve(get('/users', { 'x-api-version': '2.5' }), now);

    expect(result.version.toString()).toBe('2.0');
    expect(result.requested?.toString()).toBe('2.5');
    expect(result.match).toBe('compatible');
  });

  it('uses the default version when none is supplied', () => {
    const result = engine({ defaultVersion: '2.0' }).resolve(get('/users'), now);

    expect(result.version.toString()).toBe('2.0');
    expect(result.requested).toBeNull();
    expect(result.match).toBe('default');
    expect(result.token).toBeNull();
  });

  it('falls back to the default for unsupported requests unless strict', () => {
    const lenient = engine({ defaultVersion: '2.0' }).resolve(get('/v3/users'), now);
    expect(lenient).toMatchObject({ match: 'default', handler: 'users-v2' });

    const strict = engine({ defaultVersion: '2.0', strictVersioning: true });
    expect(() => strict.resolve(get('/v3/users'), now)).toThrow(UnsupportedVersionError);
    expect(strict.resolve(get('/users'), now).version.toString()).toBe('2.0');
  });

  it('requires a version under strict versioning without a default', () => {
    expect(() => engine({ strictVersioning: true }).resolve(get('/users'), now)).toThrow(MissingVersionError);
  });

  it('rejects requests without a version when no default is configured', () => {
    expect(() => engine().resolve(get('/users'), now)).toThrow(MissingVersionError);
    expect(() => engine().resolve(get('/accounts'), now)).toThrow(RouteNotFoundError);
  });

  it('reports unparseable tokens with their source', () => {
    expect(() => engine().resolve(get('/users', { 'x-api-version': 'two' }), now)).toThrow(
      "Invalid semantic version 'two' (from header:x-api-version)."
    );
  });

  it('reports unknown routes by their unversioned path', () => {
    expect(() => engine().resolve(get('/v1/accounts'), now)).toThrow(new RouteNotFoundError('/accounts', 'GET'));
  });

  it('evaluates deprecation against the supplied clock', () => {
    const deprecating = engine({}, (routes) => {
      routes.endpoint('GET', '/users').version('1.0').handler('users-v1').deprecated({
        sunsetDate: '2025-06-01T00:00:00.000Z',
        replacement: '/v2/users'
      });
      routes.add('GET', '/users', '2.0', 'users-v2');
    });

    const before = deprecating.resolve(get('/v1/users'), new Date(now.getTime() - 1000));
    expect(before.deprecation.status).toBe('deprecated');
    expect(before.deprecation.headers.Warning).toBe(
      '299 - "This endpoint is deprecated and will be sunset on 2025-06-01. Use /v2/users instead."'
    );

    const after = deprecating.resolve(get('/v1/users'), new Date(now.getTime() + 1000));
    expect(after.deprecation.status).toBe('sunset');
    expect(after.deprecation.headers.Warning).toBeUndefined();
  });
});

describe('VersioningEngine.create', () => {
  it('requires at least one strategy', () => {
    expect(() => engine({ strategies: [] })).toThrow(ConfigurationError);
  });

  it('validates the default version and the matrix at startup', () => {
    expect(() => engine({ defaultVersion: 'latest' })).toThrow(InvalidVersionError);
    expect(() => engine({ compatibility: { '2.0': ['2'] } })).toThrow(ConfigurationError);
  });

  it('strips the version segment behind an api prefix', () => {
    const prefixed = engine({ strategies: [{ kind: 'url_path', apiPrefix: 'api' }] }, (routes) => {
      routes.add('GET', '/api/users', '1.0', 'api-users-v1');
    });

    expect(prefixed.unversionedPath('/api/v1/users')).toBe('/api/users');
    expect(prefixed.resolve(get('/api/v1/users'), now).handler).toBe('api-users-v1');
  });
});

describe('VersioningEngine.discover', () => {
  it('summarizes versions, endpoints and configuration', () => {
    const documented = engine({ defaultVersion: '2.0', compatibility: { '2.5': ['2.0'] } }, (routes) => {
      routes.add('GET', '/users', '1.0', 'users-v1', { sunsetDate: '2025-01-01T00:00:00.000Z', replacement: '/v2/users' });
      routes.add('GET', '/users', '2.0', 'users-v2');
      routes.add('POST', '/users', '2.0', 'create-v2');
    });

    const document = documented.discover(now);

    expect(document).toMatchObject({
      format: 'semantic',
      defaultVersion: '2.0',
      latestVersion: '2.0',
      strictVersioning: false,
      compatibility: { '2.5': ['2.0'] }
    });
    expect(document.strategies.map((strategy) => strategy.name)).toEqual(['url_path', 'header']);
    expect(document.versions).toEqual([
      {
        version: '1.0',
        isDeprecated: true,
        isSunset: true,
        deprecation: {
          sunsetDate: '2025-01-01T00:00:00.000Z',
          warningLevel: 'warning',
          replacement: '/v2/users',
          reason: null,
          migrationGuide: null
        },
        endpoints: [{ method: 'GET', path: '/users', status: 'sunset' }]
      },
      {
        version: '2.0',
        isDeprecated: false,
        isSunset: false,
        deprecation: null,
        endpoints: [
          { method: 'GET', path: '/users', status: 'active' },
          { method: 'POST', path: '/users', status: 'active' }
        ]
      }
    ]);
  });
});
