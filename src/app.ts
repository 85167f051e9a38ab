import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { DestinationStream } from 'pino';
import type { AppConfig } from './infrastructure/index.js';
import {
  contextPlugin,
  indexRoutes,
  broadcastRoutes,
  notifierRoutes,
  serializeRequest,
} from './interfaces/http/index.js';
import type { AppServices } from './interfaces/http/index.js';

export interface BuildAppOptions {
  config: AppConfig;
  services: AppServices;
  /** Request logging; off in tests. */
  logger?: boolean;
  /** Where request logs go; stdout when omitted. */
  logStream?: DestinationStream;
}

/**
 * Assembles the Fastify instance without listening.
 *
 * Order:
 * 1) Config + services context
 * 2) HTTP routes
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, services, logger = true, logStream } = options;

  const fastify = Fastify({
    logger: logger
      ? {
          level: config.server.logLevel,
          ...(logStream === undefined ? {} : { stream: logStream }),
          serializers: { req: serializeRequest },
        }
      : false,
  });

  await fastify.register(contextPlugin, { config, services });

  await fastify.register(indexRoutes);
  await fastify.register(broadcastRoutes);
  await fastify.register(notifierRoutes);

  if (config.webhookSecret === undefined) {
    fastify.log.warn('WEBHOOK_SECRET is not set, webhook endpoints accept unauthenticated calls');
  }

  return fastify;
}
