import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  tableauWebhookSchema,
  updateBroadcastForWorkbook,
} from '../../application/index.js';
import { isAuthorizedWebhook, rejectUnauthorized } from './webhook-auth.js';
import { rejectUnsupportedMethod, sendSuccess } from './responses.js';

/**
 * Broadcast update webhook.
 *
 * POST /broadcast — workbook refreshed → update its broadcast
 * GET  /broadcast — redirect to the index
 * anything else   — 400
 */
async function broadcastRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.all(
    '/broadcast',
    async (request: FastifyRequest, reply: FastifyReply) => {
      if (request.method === 'GET') {
        return reply.redirect('/');
      }
      if (request.method !== 'POST') {
        return rejectUnsupportedMethod(reply);
      }

      if (!isAuthorizedWebhook(request, fastify.appConfig.webhookSecret)) {
        request.log.warn('Rejected broadcast webhook with missing or invalid token');
        return rejectUnauthorized(reply);
      }

      const parsed = tableauWebhookSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { event_type, resource_luid } = parsed.data;
      request.log.info({ event_type, workbook_id: resource_luid }, 'Broadcast webhook received');

      const { connectedApp, username } = fastify.appConfig.tableau;
      const { tableau, log } = fastify.services;

      await updateBroadcastForWorkbook(
        { ...connectedApp, username },
        resource_luid,
        { tableau, log },
      );

      return sendSuccess(reply);
    },
  );
}

export default fp(broadcastRoutes, {
  name: 'broadcast-routes',
  dependencies: ['app-context'],
  fastify: '5.x',
});
