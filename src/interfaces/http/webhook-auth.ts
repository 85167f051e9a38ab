import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

export const WEBHOOK_TOKEN_HEADER = 'x-webhook-token';

const tokenQuerySchema = z.object({ token: z.string() });

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

/**
 * Checks the shared secret on an inbound webhook.
 *
 * Tableau cannot attach custom headers to webhook calls, so the token
 * may also arrive as `?token=`. Both sides are hashed first so the
 * comparison is constant-time regardless of length.
 */
export function isAuthorizedWebhook(
  request: FastifyRequest,
  secret: string | undefined,
): boolean {
  if (secret === undefined) return true;

  const header = request.headers[WEBHOOK_TOKEN_HEADER];
  let presented: string | undefined = typeof header === 'string' ? header : undefined;

  if (presented === undefined) {
    const query = tokenQuerySchema.safeParse(request.query);
    if (query.success) presented = query.data.token;
  }

  if (presented === undefined) return false;

  return timingSafeEqual(digest(presented), digest(secret));
}

export function rejectUnauthorized(reply: FastifyReply): FastifyReply {
  return reply.status(401).type('text/plain; charset=utf-8').send('401 Unauthorized');
}
