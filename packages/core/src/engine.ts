/**
 * Per-request version resolution.
 *
 * Control flow: route table (candidate versions for the path) -> strategy
 * resolver (requested version) -> compatibility matrix (exact or fallback)
 * -> deprecation registry (status and headers). Everything the engine holds
 * is built once at startup and only read afterwards.
 */

import { CompatibilityMatrix, type NegotiationMatch } from './compatibility.js';
import type { DeprecationHeaderNames, DeprecationOutcome, DeprecationRegistry } from './deprecation.js';
import { buildDiscoveryDocument, type DiscoveryDocument } from './discovery.js';
import { ConfigurationError, IncomparableVersionError } from './errors.js';
import type { RequestView } from './request-view.js';
import { StrategyResolver } from './resolver.js';
import { RouteTableBuilder, type VersionRouteTable, type VersionSpec } from './route-table.js';
import { createStrategies, urlPathStrategies } from './strategies/index.js';
import type { RawToken, StrategyOptions } from './strategies/types.js';
import type { UrlPathStrategy } from './strategies/url-path.js';
import { Version, type VersionFormat } from './version.js';

export interface VersioningOptions {
  format: VersionFormat;
  strategies: StrategyOptions[];
  defaultVersion?: string | null;
  strictVersioning?: boolean;
  /** Version -> ordered fallbacks, e.g. `{ '2.5': ['2.1', '2.0'] }`. */
  compatibility?: Record<string, string[]>;
  deprecationHeaders?: Partial<DeprecationHeaderNames>;
}

export type ResolutionMatch = NegotiationMatch;

export interface ResolutionResult<THandler> {
  readonly spec: VersionSpec<THandler>;
  readonly handler: THandler;
  readonly version: Version;
  /** What the client asked for; null when the default version was used. */
  readonly requested: Version | null;
  readonly match: ResolutionMatch;
  readonly token: RawToken | null;
  readonly template: string;
  readonly params: Readonly<Record<string, string>>;
  readonly deprecation: DeprecationOutcome;
}

export interface EngineParts<THandler> {
  table: VersionRouteTable<THandler>;
  deprecations: DeprecationRegistry;
  resolver: StrategyResolver;
  matrix: CompatibilityMatrix;
  defaultVersion: Version | null;
  strictVersioning: boolean;
}

export class VersioningEngine<THandler> {
  readonly table: VersionRouteTable<THandler>;
  readonly deprecations: DeprecationRegistry;
  readonly resolver: StrategyResolver;
  readonly matrix: CompatibilityMatrix;
  readonly defaultVersion: Version | null;
  readonly strictVersioning: boolean;
  private readonly urlStrategies: readonly UrlPathStrategy[];

  constructor(parts: EngineParts<THandler>) {
    const format = parts.table.format;
    for (const version of [...parts.matrix.versions(), ...(parts.defaultVersion ? [parts.defaultVersion] : [])]) {
      if (version.format !== format) {
        throw new IncomparableVersionError(format, version);
      }
    }

    this.table = parts.table;
    this.deprecations = parts.deprecations;
    this.resolver = parts.resolver;
    this.matrix = parts.matrix;
    this.defaultVersion = parts.defaultVersion;
    this.strictVersioning = parts.strictVersioning;
    this.urlStrategies = urlPathStrategies(parts.resolver.strategies);
    Object.freeze(this);
  }

  /**
   * Validates the configuration, lets `register` fill the route table and
   * freezes the result.
   */
  static create<THandler>(
    options: VersioningOptions,
    register: (routes: RouteTableBuilder<THandler>) => void
  ): VersioningEngine<THandler> {
    if (options.strategies.length === 0) {
      throw new ConfigurationError('At least one versioning strategy must be configured.');
    }

    const defaultVersion = options.defaultVersion ? Version.parse(options.defaultVersion, options.format) : null;
    const matrix = options.compatibility
      ? CompatibilityMatrix.fromRecord(options.compatibility, options.format)
      : CompatibilityMatrix.empty();
    const strictVersioning = options.strictVersioning ?? false;

    const builder = new RouteTableBuilder<THandler>({
      format: options.format,
      deprecationHeaders: options.deprecationHeaders
    });
    register(builder);
    const { table, deprecations } = builder.build();

    const resolver = new StrategyResolver(createStrategies(options.strategies), {
      format: options.format,
      defaultVersion,
      strictVersioning
    });

    return new VersioningEngine({ table, deprecations, resolver, matrix, defaultVersion, strictVersioning });
  }

  get format(): VersionFormat {
    return this.table.format;
  }

  /** The request path with any URL version segment removed. */
  unversionedPath(path: string): string {
    for (const strategy of this.urlStrategies) {
      if (!strategy.enabled) continue;
      const stripped = strategy.stripVersion(path);
      if (stripped !== null) return stripped;
    }
    return path;
  }

  resolve(request: RequestView, now: Date = new Date()): ResolutionResult<THandler> {
    const path = this.unversionedPath(request.path);
    const route = this.table.match(path, request.method);
    const available = route.specs.map((spec) => spec.version);
    const resolution = this.resolver.resolve(request);

    let version: Version;
    let match: ResolutionMatch;
    let requested: Version | null = null;
    let token: RawToken | null = null;

    switch (resolution.kind) {
      case 'requested': {
        // Strict mode never swaps an explicit request for the default.
        const negotiated = this.matrix.negotiate(
          resolution.version,
          available,
          this.strictVersioning ? null : this.defaultVersion
        );
        ({ version, match } = negotiated);
        requested = resolution.version;
        token = resolution.token;
        break;
      }
      case 'default': {
        const negotiated = this.matrix.negotiate(resolution.version, available);
        version = negotiated.version;
        match = negotiated.match === 'exact' ? 'default' : negotiated.match;
        break;
      }
    }

    const spec = this.table.lookupExact(path, request.method, version);

    return Object.freeze({
      spec,
      handler: spec.handler,
      version,
      requested,
      match,
      token,
      template: route.template,
      params: route.params,
      deprecation: this.deprecations.evaluate(spec, now)
    });
  }

  discover(now: Date = new Date()): DiscoveryDocument {
    return buildDiscoveryDocument(
      {
        table: this.table,
        deprecations: this.deprecations,
        strategies: this.resolver.strategies,
        matrix: this.matrix,
        defaultVersion: this.defaultVersion,
        strictVersioning: this.strictVersioning
      },
      now
    );
  }
}
