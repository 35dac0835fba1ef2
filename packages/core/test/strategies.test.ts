import { describe, expect, it } from 'vitest';
import { createRequestView } from '../src/request-view.js';
import {
  AcceptHeaderStrategy,
  CompositeStrategy,
  createStrategy,
  HeaderStrategy,
  QueryParameterStrategy,
  UrlPathStrategy
} from '../src/strategies/index.js';

const request = (url: string, headers: Record<string, string> = {}) =>
  createRequestView({ url, method: 'get', headers });

describe('UrlPathStrategy', () => {
  it('reads the segment after the prefix', () => {
    const strategy = new UrlPathStrategy();

    expect(strategy.extract(request('/v2/users'))).toEqual({ value: '2', source: 'path:/v2', strategy: 'url_path' });
    expect(strategy.extract(request('/v1.1'))).toMatchObject({ value: '1.1' });
  });

  it('ignores segments that do not start with a digit', () => {
    const strategy = new UrlPathStrategy();

    expect(strategy.extract(request('/videos/12'))).toBeNull();
    expect(strategy.extract(request('/users/v2'))).toBeNull();
  });

  it('honours an api prefix and strips the version segment', () => {
    const strategy = new UrlPathStrategy({ apiPrefix: '/api/' });

    expect(strategy.extract(request('/api/v1.1/users'))).toMatchObject({ value: '1.1', source: 'path:/api/v1.1' });
    expect(strategy.extract(request('/v1.1/users'))).toBeNull();
    expect(strategy.stripVersion('/api/v1.1/users')).toBe('/api/users');
    expect(strategy.stripVersion('/api/users')).toBeNull();
  });

  it('leaves the root when the version was the only segment', () => {
    expect(new UrlPathStrategy().stripVersion('/v3')).toBe('/');
  });
});

describe('HeaderStrategy', () => {
  it('matches header names case-insensitively and trims the value', () => {
    const strategy = new HeaderStrategy();

    expect(strategy.extract(request('/users', { 'X-API-Version': ' 2.0 ' }))).toEqual({
      value: '2.0',
      source: 'header:x-api-version',
      strategy: 'header'
    });
  });

  it('falls back to alternative headers in order', () => {
    const strategy = new HeaderStrategy({ alternatives: ['Api-Version', 'Accept-Version'] });
    const token = strategy.extract(request('/users', { 'accept-version': '1.0', 'api-version': '1.1' }));

    expect(token).toMatchObject({ value: '1.1', source: 'header:api-version' });
  });

  it('skips empty headers', () => {
    const strategy = new HeaderStrategy({ alternatives: ['api-version'] });

    expect(strategy.extract(request('/users', { 'x-api-version': '  ', 'api-version': '3.0' }))).toMatchObject({
      value: '3.0'
    });
  });

  it('reads a named sub-field from a composite value', () => {
    const strategy = new HeaderStrategy({ field: 'version' });
    const token = strategy.extract(request('/users', { 'x-api-version': 'channel=beta; version="2.1"' }));

    expect(token).toMatchObject({ value: '2.1', source: 'header:x-api-version;version' });
  });
});

describe('QueryParameterStrategy', () => {
  it('is case-insensitive unless configured otherwise', () => {
    expect(new QueryParameterStrategy().extract(request('/users?Version=1.5'))).toEqual({
      value: '1.5',
      source: 'query:Version',
      strategy: 'query_param'
    });
    expect(new QueryParameterStrategy({ caseSensitive: true }).extract(request('/users?Version=1.5'))).toBeNull();
  });

  it('checks alternatives after the primary name', () => {
    const strategy = new QueryParameterStrategy({ alternatives: ['v'] });

    expect(strategy.extract(request('/users?v=3'))).toMatchObject({ value: '3', source: 'query:v' });
    expect(strategy.extract(request('/users?v=3&version=2'))).toMatchObject({ value: '2', source: 'query:version' });
  });
});

describe('AcceptHeaderStrategy', () => {
  it('reads the version parameter of a media range', () => {
    const strategy = new AcceptHeaderStrategy();

    expect(strategy.extract(request('/users', { accept: 'text/html, application/json; version=2.0' }))).toEqual({
      value: '2.0',
      source: 'accept:application/json;version',
      strategy: 'accept_header'
    });
  });

  it('restricts the parameter lookup to the configured media type', () => {
    const strategy = new AcceptHeaderStrategy({ mediaType: 'application/json' });

    expect(strategy.extract(request('/users', { accept: 'text/plain; version=1.0' }))).toBeNull();
  });

  it('recognises vendor media types only when enabled', () => {
    const headers = { accept: 'application/vnd.acme.v3+json' };

    expect(new AcceptHeaderStrategy().extract(request('/users', headers))).toBeNull();
    expect(new AcceptHeaderStrategy({ vendorPattern: true }).extract(request('/users', headers))).toMatchObject({
      value: '3',
      source: 'accept:application/vnd.acme.v3+json'
    });
  });
});

describe('CompositeStrategy', () => {
  it('evaluates children by priority', () => {
    const composite = createStrategy({
      kind: 'composite',
      name: 'header-or-query',
      strategies: [
        { kind: 'header', priority: 20 },
        { kind: 'query_param', priority: 10 }
      ]
    });
    const token = composite.extract(request('/users?version=1.0', { 'x-api-version': '2.0' }));

    expect(token).toMatchObject({ value: '1.0', strategy: 'query_param' });
  });

  it('skips disabled children and describes the nested strategies', () => {
    const composite = new CompositeStrategy([
      new HeaderStrategy({ enabled: false }),
      new QueryParameterStrategy()
    ]);

    expect(composite.extract(request('/users', { 'x-api-version': '2.0' }))).toBeNull();
    expect(composite.describe().strategies?.map((child) => child.kind)).toEqual(['header', 'query_param']);
  });
});
