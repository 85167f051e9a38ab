import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type {
  AuditLog,
  NotificationGateway,
  TableauClient,
} from '../../application/index.js';
import type { AppConfig } from '../../infrastructure/config/env.js';

/** Collaborators the route handlers call into. */
export interface AppServices {
  readonly tableau: TableauClient;
  readonly gateway: NotificationGateway;
  readonly audit: AuditLog;
  readonly log: Logger;
}

export interface AppContextOptions {
  config: AppConfig;
  services: AppServices;
}

/**
 * Exposes the startup config and service graph to every route.
 *
 * Decorates `fastify.appConfig` and `fastify.services`; handlers never
 * read `process.env` themselves. Closes the audit log on shutdown.
 */
async function contextPlugin(
  fastify: FastifyInstance,
  options: AppContextOptions,
): Promise<void> {
  fastify.decorate('appConfig', options.config);
  fastify.decorate('services', options.services);

  fastify.addHook('onClose', async () => {
    await options.services.audit.close();
    fastify.log.info('Audit log closed');
  });
}

export default fp<AppContextOptions>(contextPlugin, {
  name: 'app-context',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    appConfig: AppConfig;
    services: AppServices;
  }
}
