/**
 * Fastify boundary for the versioning engine.
 *
 * Versioned endpoints are not registered with Fastify one by one. A single
 * catch-all route hands every request to the engine, which picks the handler,
 * and this layer merges the lifecycle headers into the reply.
 */

import {
  createRequestView,
  HTTP_METHODS,
  VersioningError,
  type DeprecationOutcome,
  type RequestView,
  type ResolutionMatch,
  type ResolutionResult,
  type Version,
  type VersioningEngine
} from '@versionkit/core';
import { log, type ServiceLogger, type ServiceMetrics } from '@versionkit/observability';
import type { FastifyInstance, FastifyReply, FastifyRequest, HTTPMethods } from 'fastify';
import { deny, denyVersioningError } from './errors.js';

export interface VersionContext {
  version: Version;
  requested: Version | null;
  match: ResolutionMatch;
  template: string;
  params: Readonly<Record<string, string>>;
  deprecation: DeprecationOutcome;
}

export type VersionedHandler = (request: FastifyRequest, reply: FastifyReply, context: VersionContext) => unknown;

export interface VersioningPluginOptions {
  engine: VersioningEngine<VersionedHandler>;
  /** Answer 410 instead of running handlers whose sunset date has passed. */
  enforceSunset?: boolean;
  /** `false` disables the discovery route. */
  discoveryPath?: string | false;
  /** Response header carrying the version that served the request. */
  versionHeader?: string;
  logger?: Pick<ServiceLogger, 'info' | 'warn'>;
  metrics?: Pick<ServiceMetrics, 'versionResolutionCount' | 'versionErrorCount'>;
  now?: () => Date;
}

const DISPATCH_METHODS: HTTPMethods[] = [...HTTP_METHODS, 'HEAD'];

const resolvedTemplates = new WeakMap<FastifyRequest, string>();

const baseLogger: Pick<ServiceLogger, 'info' | 'warn'> = {
  info: (message, metadata) => log('info', message, metadata),
  warn: (message, metadata) => log('warn', message, metadata)
};

/** HEAD requests are resolved against the GET endpoints. */
export function toRequestView(request: FastifyRequest): RequestView {
  return createRequestView({
    url: request.url,
    method: request.method === 'HEAD' ? 'GET' : request.method,
    headers: request.headers
  });
}

/** Path template of the versioned endpoint that served `request`, once resolved. */
export function resolvedTemplate(request: FastifyRequest): string | undefined {
  return resolvedTemplates.get(request);
}

export function registerVersioning(app: FastifyInstance, options: VersioningPluginOptions): void {
  const { engine, metrics } = options;
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? baseLogger;
  const versionHeader = options.versionHeader ?? 'api-version';
  const discoveryPath = options.discoveryPath ?? '/versions';

  if (discoveryPath !== false) {
    app.get(discoveryPath, async () => engine.discover(now()));
  }

  app.route({
    method: DISPATCH_METHODS,
    url: '/*',
    exposeHeadRoute: false,
    handler: async (request, reply) => {
      let result: ResolutionResult<VersionedHandler>;
      try {
        result = engine.resolve(toRequestView(request), now());
      } catch (error) {
        if (!(error instanceof VersioningError)) {
          throw error;
        }

        metrics?.versionErrorCount.labels(error.code).inc();
        logger.warn('API version resolution rejected', {
          requestId: request.id,
          code: error.code,
          method: request.method,
          path: request.url,
          details: error.details
        });
        return denyVersioningError(request, reply, error);
      }

      const { deprecation } = result;
      const version = result.version.toString();
      resolvedTemplates.set(request, result.template);

      reply.header(versionHeader, version);
      for (const [name, value] of Object.entries(deprecation.headers)) {
        reply.header(name, value);
      }
      metrics?.versionResolutionCount.labels(version, result.match, deprecation.status).inc();

      if (deprecation.status !== 'active') {
        logger[deprecation.status === 'sunset' ? 'warn' : 'info']('Deprecated API version accessed', {
          requestId: request.id,
          version,
          status: deprecation.status,
          method: request.method,
          path: result.template
        });
      }

      if (deprecation.status === 'sunset' && options.enforceSunset) {
        return deny({
          request,
          reply,
          status: 410,
          code: 'VERSION_SUNSET',
          message: deprecation.message ?? `Version ${version} has been sunset.`,
          details: { version, path: result.template }
        });
      }

      return result.handler(request, reply, {
        version: result.version,
        requested: result.requested,
        match: result.match,
        template: result.template,
        params: result.params,
        deprecation
      });
    }
  });
}
