import type { AccountsApiServiceEnv } from '@versionkit/config';
import { VersioningEngine, type VersioningOptions } from '@versionkit/core';
import { registerServiceMetrics, registerVersioning, resolvedTemplate, type VersionedHandler } from '@versionkit/http';
import { createServiceLogger } from '@versionkit/observability';
import Fastify, { type FastifyInstance } from 'fastify';
import { InMemoryUserRepository, type UserRepository } from './modules/users/index.js';
import { registerUserRoutes } from './routes/users.js';

const SERVICE_NAME = 'accounts-api';

export interface AccountsApiOptions {
  versioning: VersioningOptions;
  env: Pick<AccountsApiServiceEnv, 'API_ENFORCE_SUNSET' | 'API_DISCOVERY_PATH' | 'LOG_LEVEL'>;
  repository?: UserRepository;
  now?: () => Date;
}

export async function buildAccountsApiApp(options: AccountsApiOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  const logger = createServiceLogger({ service: SERVICE_NAME, minLevel: options.env.LOG_LEVEL });
  const repository = options.repository ?? new InMemoryUserRepository();

  // Configuration errors surface here, before the server listens.
  const engine = VersioningEngine.create<VersionedHandler>(options.versioning, (routes) => {
    registerUserRoutes(routes, repository);
  });

  const metrics = registerServiceMetrics(app, SERVICE_NAME, { routeLabel: resolvedTemplate });

  app.get('/healthz', async () => ({ ok: true, service: SERVICE_NAME }));

  registerVersioning(app, {
    engine,
    enforceSunset: options.env.API_ENFORCE_SUNSET,
    discoveryPath: options.env.API_DISCOVERY_PATH,
    logger,
    metrics,
    now: options.now
  });

  await app.ready();
  return app;
}
