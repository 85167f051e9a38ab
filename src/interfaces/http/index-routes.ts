import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

export const INDEX_HTML = [
  '<h1>Notifier API Index</h1>',
  '<ul>',
  '<li>/notifier <strong>POST</strong> - receives Tableau webhooks and sends datasource failure notifications by SMS, WhatsApp and voice call</li>',
  '<li>/broadcast <strong>POST</strong> - receives Tableau workbook webhooks and updates the matching broadcast</li>',
  '</ul>',
].join('\n');

/**
 * Capability listing.
 *
 * ALL / — static HTML, whatever the method.
 */
async function indexRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.all('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.type('text/html; charset=utf-8').send(INDEX_HTML);
  });
}

export default fp(indexRoutes, {
  name: 'index-routes',
  fastify: '5.x',
});
