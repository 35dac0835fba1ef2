import {
  DeprecationRegistry,
  normalizeDeprecation,
  type DeprecationHeaderNames,
  type DeprecationInfo,
  type DeprecationInput
} from './deprecation.js';
import { ConfigurationError, IncomparableVersionError, RouteNotFoundError, VersionNotFoundError } from './errors.js';
import { Ordering, sortVersions, Version, type VersionFormat } from './version.js';

/** Methods a versioned endpoint may be registered for. HEAD is answered by GET endpoints. */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface VersionSpec<THandler> {
  /** `METHOD /template@version`, unique within a table. */
  readonly id: string;
  readonly pathTemplate: string;
  readonly method: HttpMethod;
  readonly version: Version;
  readonly handler: THandler;
}

export interface RouteMatch<THandler> {
  readonly template: string;
  readonly method: HttpMethod;
  readonly params: Readonly<Record<string, string>>;
  readonly specs: readonly VersionSpec<THandler>[];
}

export interface RouteEntry<THandler> {
  template: string;
  segments: readonly string[];
  staticSegments: number;
  byMethod: Map<HttpMethod, VersionSpec<THandler>[]>;
}

export function normalizePath(path: string): string {
  const withLeading = path.startsWith('/') ? path : `/${path}`;
  const collapsed = withLeading.replace(/\/{2,}/g, '/');
  return collapsed.length > 1 && collapsed.endsWith('/') ? collapsed.slice(0, -1) : collapsed;
}

function splitSegments(path: string): string[] {
  return path === '/' ? [] : path.slice(1).split('/');
}

function toMethod(method: string): HttpMethod {
  const upper = method.toUpperCase();
  const known = HTTP_METHODS.find((candidate) => candidate === upper);
  if (known === undefined) {
    throw new ConfigurationError(`Unsupported HTTP method '${method}'.`, { method });
  }
  return known;
}

function specId(method: HttpMethod, template: string, version: Version): string {
  return `${method} ${template}@${version.toString()}`;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function matchSegments(pattern: readonly string[], actual: readonly string[]): Record<string, string> | null {
  if (pattern.length !== actual.length) return null;
  const params: Record<string, string> = {};
  for (let index = 0; index < pattern.length; index += 1) {
    const expected = pattern[index] ?? '';
    const segment = actual[index] ?? '';
    if (expected.startsWith(':')) {
      if (segment.length === 0) return null;
      params[expected.slice(1)] = safeDecode(segment);
    } else if (expected !== segment) {
      return null;
    }
  }
  return params;
}

/**
 * Read-only (path, method, version) -> handler table. Only
 * RouteTableBuilder creates instances.
 */
export class VersionRouteTable<THandler> {
  private readonly entries: readonly RouteEntry<THandler>[];

  constructor(
    readonly format: VersionFormat,
    entries: readonly RouteEntry<THandler>[]
  ) {
    // Most specific template first; registration order breaks ties.
    this.entries = [...entries].sort((left, right) => right.staticSegments - left.staticSegments);
    Object.freeze(this);
  }

  match(path: string, method: string): RouteMatch<THandler> {
    const normalized = normalizePath(path);
    const segments = splitSegments(normalized);
    const upper = method.toUpperCase();

    for (const entry of this.entries) {
      const params = matchSegments(entry.segments, segments);
      if (params === null) continue;
      for (const [entryMethod, specs] of entry.byMethod) {
        if (entryMethod === upper) {
          return Object.freeze({ template: entry.template, method: entryMethod, params: Object.freeze(params), specs });
        }
      }
    }

    throw new RouteNotFoundError(normalized, upper);
  }

  lookup(path: string, method: string): readonly VersionSpec<THandler>[] {
    return this.match(path, method).specs;
  }

  lookupExact(path: string, method: string, version: Version): VersionSpec<THandler> {
    const { specs, template, method: matchedMethod } = this.match(path, method);
    const found = specs.find((spec) => spec.version.compare(version) === Ordering.EQUAL);
    if (!found) {
      throw new VersionNotFoundError(template, matchedMethod, version);
    }
    return found;
  }

  versionsFor(path: string, method: string): Version[] {
    return sortVersions(this.lookup(path, method).map((spec) => spec.version));
  }

  specs(): VersionSpec<THandler>[] {
    const all: VersionSpec<THandler>[] = [];
    for (const entry of this.entries) {
      for (const specs of entry.byMethod.values()) {
        all.push(...specs);
      }
    }
    return all;
  }

  versions(): Version[] {
    const distinct = new Map<string, Version>();
    for (const spec of this.specs()) {
      distinct.set(spec.version.toString(), spec.version);
    }
    return sortVersions(distinct.values());
  }
}

/**
 * Accumulates one VersionSpec. Each field may be set once; setting it again
 * is a configuration error, so the order of calls never changes the result.
 */
export class EndpointBuilder<THandler> {
  private versionValue: Version | null = null;
  private handlerValue: { value: THandler } | null = null;
  private deprecationValue: DeprecationInfo | null = null;

  constructor(
    readonly method: HttpMethod,
    readonly pathTemplate: string,
    private readonly format: VersionFormat
  ) {}

  private describe(): string {
    return `${this.method} ${this.pathTemplate}`;
  }

  version(version: Version | string): this {
    if (this.versionValue !== null) {
      throw new ConfigurationError(`Version for ${this.describe()} is already set.`, { route: this.describe() });
    }
    this.versionValue = typeof version === 'string' ? Version.parse(version, this.format) : version;
    return this;
  }

  handler(handler: THandler): this {
    if (this.handlerValue !== null) {
      throw new ConfigurationError(`Handler for ${this.describe()} is already set.`, { route: this.describe() });
    }
    this.handlerValue = { value: handler };
    return this;
  }

  deprecated(input: DeprecationInput | DeprecationInfo = {}): this {
    if (this.deprecationValue !== null) {
      throw new ConfigurationError(`Deprecation for ${this.describe()} is already set.`, { route: this.describe() });
    }
    this.deprecationValue = normalizeDeprecation(input);
    return this;
  }

  /** @internal */
  finalize(): { spec: VersionSpec<THandler>; deprecation: DeprecationInfo | null } {
    if (this.versionValue === null) {
      throw new ConfigurationError(`${this.describe()} was registered without a version.`, { route: this.describe() });
    }
    if (this.handlerValue === null) {
      throw new ConfigurationError(`${this.describe()} was registered without a handler.`, { route: this.describe() });
    }

    const spec: VersionSpec<THandler> = Object.freeze({
      id: specId(this.method, this.pathTemplate, this.versionValue),
      pathTemplate: this.pathTemplate,
      method: this.method,
      version: this.versionValue,
      handler: this.handlerValue.value
    });
    return { spec, deprecation: this.deprecationValue };
  }
}

export interface RouteTableBuilderOptions {
  format: VersionFormat;
  deprecationHeaders?: Partial<DeprecationHeaderNames>;
}

export interface BuiltRoutes<THandler> {
  table: VersionRouteTable<THandler>;
  deprecations: DeprecationRegistry;
}

export class RouteTableBuilder<THandler> {
  readonly format: VersionFormat;
  private readonly pending: EndpointBuilder<THandler>[] = [];
  private readonly deprecationHeaders: Partial<DeprecationHeaderNames>;
  private built = false;

  constructor(options: RouteTableBuilderOptions) {
    this.format = options.format;
    this.deprecationHeaders = options.deprecationHeaders ?? {};
  }

  endpoint(method: string, pathTemplate: string): EndpointBuilder<THandler> {
    if (this.built) {
      throw new ConfigurationError('Route table is already built; register routes during startup.', {
        route: `${method.toUpperCase()} ${pathTemplate}`
      });
    }
    const endpoint = new EndpointBuilder<THandler>(toMethod(method), normalizePath(pathTemplate), this.format);
    this.pending.push(endpoint);
    return endpoint;
  }

  add(
    method: string,
    pathTemplate: string,
    version: Version | string,
    handler: THandler,
    deprecation?: DeprecationInput | DeprecationInfo
  ): this {
    const endpoint = this.endpoint(method, pathTemplate).version(version).handler(handler);
    if (deprecation !== undefined) {
      endpoint.deprecated(deprecation);
    }
    return this;
  }

  build(): BuiltRoutes<THandler> {
    if (this.built) {
      throw new ConfigurationError('Route table is already built.');
    }
    this.built = true;

    const deprecations = new DeprecationRegistry(this.deprecationHeaders);
    const entries = new Map<string, RouteEntry<THandler>>();
    const shapes = new Map<string, string>();

    for (const endpoint of this.pending) {
      const { spec, deprecation } = endpoint.finalize();
      if (spec.version.format !== this.format) {
        throw new IncomparableVersionError(this.format, spec.version);
      }

      const segments = splitSegments(spec.pathTemplate);
      const shape = segments.map((segment) => (segment.startsWith(':') ? ':' : segment)).join('/');
      const sameShape = shapes.get(shape);
      if (sameShape !== undefined && sameShape !== spec.pathTemplate) {
        throw new ConfigurationError(`Route ${spec.pathTemplate} is ambiguous with ${sameShape}.`, {
          route: spec.pathTemplate,
          conflictsWith: sameShape
        });
      }
      shapes.set(shape, spec.pathTemplate);

      let entry = entries.get(spec.pathTemplate);
      if (!entry) {
        entry = {
          template: spec.pathTemplate,
          segments,
          staticSegments: segments.filter((segment) => !segment.startsWith(':')).length,
          byMethod: new Map()
        };
        entries.set(spec.pathTemplate, entry);
      }

      const specs = entry.byMethod.get(spec.method) ?? [];
      if (specs.some((existing) => existing.version.compare(spec.version) === Ordering.EQUAL)) {
        throw new ConfigurationError(`${spec.id} is registered more than once.`, { spec: spec.id });
      }
      specs.push(spec);
      entry.byMethod.set(spec.method, specs);

      if (deprecation !== null) {
        deprecations.attach(spec, deprecation);
      }
    }

    return { table: new VersionRouteTable(this.format, [...entries.values()]), deprecations: deprecations.seal() };
  }
}
