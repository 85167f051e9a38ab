import type { FastifyReply } from 'fastify';

export const SUCCESS_BODY = '200 SUCCESS';
export const METHOD_NOT_SUPPORTED_BODY = '400 Bad Request: method not supported';

const TEXT = 'text/plain; charset=utf-8';

export function sendSuccess(reply: FastifyReply): FastifyReply {
  return reply.status(200).type(TEXT).send(SUCCESS_BODY);
}

/** Webhook endpoints only speak GET (redirect) and POST. */
export function rejectUnsupportedMethod(reply: FastifyReply): FastifyReply {
  return reply
    .status(400)
    .header('Allow', 'GET, POST')
    .type(TEXT)
    .send(METHOD_NOT_SUPPORTED_BODY);
}
