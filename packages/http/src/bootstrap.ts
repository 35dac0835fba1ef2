import { log } from '@versionkit/observability';
import type { FastifyInstance } from 'fastify';

type CleanupFn = () => Promise<void> | void;

export interface ServiceBootstrapOptions {
  serviceName: string;
  buildApp: () => Promise<FastifyInstance>;
  port: number;
  host: string;
  onReady?: (app: FastifyInstance) => Promise<void | CleanupFn> | void | CleanupFn;
  onShutdown?: () => Promise<void> | void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runService(options: ServiceBootstrapOptions): Promise<FastifyInstance> {
  const app = await options.buildApp();
  const extraCleanup = await options.onReady?.(app);

  await app.listen({ port: options.port, host: options.host });
  log('info', `${options.serviceName} listening`, { host: options.host, port: options.port });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    log('warn', `${options.serviceName} shutting down`, { signal });

    if (extraCleanup) {
      await extraCleanup();
    }

    await app.close();
    await options.onShutdown?.();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      log('error', `${options.serviceName} failed to shut down cleanly`, { signal, error: errorMessage(error) });
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  return app;
}

export function runServiceAndExit(options: ServiceBootstrapOptions): void {
  runService(options).catch((error: unknown) => {
    log('error', `${options.serviceName} failed to start`, {
      error: errorMessage(error)
    });
    process.exit(1);
  });
}
