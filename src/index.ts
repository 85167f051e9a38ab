import 'dotenv/config';
import pino from 'pino';
import { buildApp } from './app.js';
import {
  loadConfig,
  TableauRestClient,
  createTwilioClient,
  createTwilioGateway,
  createFileAuditLog,
} from './infrastructure/index.js';

const bootLog = pino();

/**
 * Bootstrap.
 *
 * Order:
 * 1) Validate environment (fatal on the first missing variable)
 * 2) Service graph: Tableau client, Twilio gateway, audit log
 * 3) Fastify app + signal handlers
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const log = pino({ level: config.server.logLevel });

  const audit = await createFileAuditLog(config.auditLogPath, log);

  const services = {
    tableau: new TableauRestClient(
      {
        serverUrl: config.tableau.serverUrl,
        apiVersion: config.tableau.apiVersion,
        siteName: config.tableau.siteName,
      },
      log,
    ),
    gateway: createTwilioGateway(
      createTwilioClient(config.twilio.accountSid, config.twilio.authToken),
      log,
    ),
    audit,
    log,
  };

  const fastify = await buildApp({ config, services });

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  fastify.log.info({ audit_log: config.auditLogPath }, 'Notifier ready');
}

main().catch((err: unknown) => {
  bootLog.fatal({ err }, 'Fatal: failed to start server');
  process.exit(1);
});
