import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  notifyFailingDatasources,
  tableauWebhookSchema,
} from '../../application/index.js';
import { isAuthorizedWebhook, rejectUnauthorized } from './webhook-auth.js';
import { rejectUnsupportedMethod, sendSuccess } from './responses.js';

/**
 * Datasource failure webhook.
 *
 * POST /notifier — notify on every datasource of the site
 * GET  /notifier — redirect to the index
 * anything else  — 400
 *
 * The Tableau payload is optional here: the batch always covers the
 * whole site, the body is only logged.
 */
async function notifierRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.all(
    '/notifier',
    async (request: FastifyRequest, reply: FastifyReply) => {
      if (request.method === 'GET') {
        return reply.redirect('/');
      }
      if (request.method !== 'POST') {
        return rejectUnsupportedMethod(reply);
      }

      if (!isAuthorizedWebhook(request, fastify.appConfig.webhookSecret)) {
        request.log.warn('Rejected notifier webhook with missing or invalid token');
        return rejectUnauthorized(reply);
      }

      const event = tableauWebhookSchema.safeParse(request.body);
      if (event.success) {
        request.log.info(
          {
            event_type: event.data.event_type,
            resource_name: event.data.resource_name,
            datasource_id: event.data.resource_luid,
          },
          'Notifier webhook received',
        );
      }

      const { personalAccessToken } = fastify.appConfig.tableau;
      const { sms, whatsapp } = fastify.appConfig.twilio;

      const result = await notifyFailingDatasources(
        { personalAccessToken, sms, whatsapp },
        fastify.services,
      );

      if (result.failed === 0) {
        return sendSuccess(reply);
      }

      const failures = result.reports.flatMap((report) =>
        report.deliveries.flatMap((delivery) =>
          delivery.status === 'failed'
            ? [{ datasource: report.datasource.name, channel: delivery.channel, error: delivery.error }]
            : [],
        ),
      );

      request.log.error(
        { total: result.total, sent: result.sent, failed: result.failed },
        'Notification batch finished with failures',
      );

      return reply.status(502).send({
        status: 'partial_failure',
        total: result.total,
        sent: result.sent,
        failed: result.failed,
        failures,
      });
    },
  );
}

export default fp(notifierRoutes, {
  name: 'notifier-routes',
  dependencies: ['app-context'],
  fastify: '5.x',
});
