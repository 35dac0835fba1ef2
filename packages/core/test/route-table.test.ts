import { describe, expect, it } from 'vitest';
import { ConfigurationError, IncomparableVersionError, RouteNotFoundError, VersionNotFoundError } from '../src/errors.js';
import { RouteTableBuilder } from '../src/route-table.js';
import { Version } from '../src/version.js';

function buildTable() {
  const routes = new RouteTableBuilder<string>({ format: 'semantic' });
  routes
    .add('GET', '/users', '2.0', 'list-v2')
    .add('get', '/users', '1.0', 'list-v1', { replacement: '/v2/users' })
    .add('GET', '/users/:id', '1.0', 'show-v1')
    .add('GET', '/users/me', '1.0', 'me-v1')
    .add('POST', '/users', '2.0', 'create-v2');
  return routes.build();
}

describe('VersionRouteTable', () => {
  const { table, deprecations } = buildTable();

  it('lists versions per path and method', () => {
    expect(table.versionsFor('/users', 'GET').map(String)).toEqual(['1.0', '2.0']);
    expect(table.versionsFor('/users/', 'post').map(String)).toEqual(['2.0']);
    expect(table.versions().map(String)).toEqual(['1.0', '2.0']);
  });

  it('extracts template parameters', () => {
    expect(table.match('/users/42', 'GET')).toMatchObject({ template: '/users/:id', method: 'GET', params: { id: '42' } });
    expect(table.match('/users/a%20b', 'GET').params).toEqual({ id: 'a b' });
  });

  it('prefers static segments over parameters', () => {
    expect(table.match('/users/me', 'GET').template).toBe('/users/me');
  });

  it('returns the exact spec', () => {
    const spec = table.lookupExact('/users', 'GET', Version.parse('1.0', 'semantic'));

    expect(spec.id).toBe('GET /users@1.0');
    expect(spec.handler).toBe('list-v1');
    expect(deprecations.get(spec)?.replacement).toBe('/v2/users');
  });

  it('distinguishes unknown routes from unknown versions', () => {
    expect(() => table.lookup('/accounts', 'GET')).toThrow(RouteNotFoundError);
    expect(() => table.lookup('/users', 'DELETE')).toThrow(RouteNotFoundError);
    expect(() => table.lookupExact('/users', 'POST', Version.parse('1.0', 'semantic'))).toThrow(VersionNotFoundError);
  });
});

describe('RouteTableBuilder', () => {
  it('only accepts methods that are dispatched', () => {
    const routes = new RouteTableBuilder<string>({ format: 'semantic' });

    expect(() => routes.endpoint('HEAD', '/users')).toThrow(new ConfigurationError("Unsupported HTTP method 'HEAD'."));
    expect(() => routes.endpoint('options', '/users')).toThrow(ConfigurationError);
    expect(routes.endpoint('patch', '/users').method).toBe('PATCH');
  });

  it('rejects a field set twice', () => {
    const endpoint = new RouteTableBuilder<string>({ format: 'simple' }).endpoint('GET', '/users').version('1.0');

    expect(() => endpoint.version('2.0')).toThrow(ConfigurationError);
  });

  it('requires a version and a handler', () => {
    const routes = new RouteTableBuilder<string>({ format: 'simple' });
    routes.endpoint('GET', '/users').version('1.0');

    expect(() => routes.build()).toThrow('GET /users was registered without a handler.');
  });

  it('rejects duplicate specs', () => {
    const routes = new RouteTableBuilder<string>({ format: 'simple' });
    routes.add('GET', '/users', '1', 'a').add('GET', '/users', '1.0', 'b');

    expect(() => routes.build()).toThrow('GET /users@1.0 is registered more than once.');
  });

  it('rejects templates that match the same paths', () => {
    const routes = new RouteTableBuilder<string>({ format: 'simple' });
    routes.add('GET', '/users/:id', '1.0', 'a').add('GET', '/users/:userId', '1.0', 'b');

    expect(() => routes.build()).toThrow(ConfigurationError);
  });

  it('rejects versions of another format', () => {
    const routes = new RouteTableBuilder<string>({ format: 'simple' });
    routes.add('GET', '/users', Version.parse('1.0.0', 'semantic'), 'a');

    expect(() => routes.build()).toThrow(IncomparableVersionError);
  });

  it('refuses registrations after build', () => {
    const routes = new RouteTableBuilder<string>({ format: 'simple' });
    routes.add('GET', '/users', '1.0', 'a').build();

    expect(() => routes.endpoint('GET', '/accounts')).toThrow(ConfigurationError);
  });
});
