import type { FastifyRequest } from 'fastify';

export const REDACTED = 'redacted';

/** Masks the `token` query parameter, which may carry the webhook secret. */
export function redactWebhookToken(url: string): string {
  const queryStart = url.indexOf('?');
  if (queryStart === -1) return url;

  const params = new URLSearchParams(url.slice(queryStart + 1));
  if (!params.has('token')) return url;

  params.set('token', REDACTED);
  return `${url.slice(0, queryStart)}?${params.toString()}`;
}

/** Request log serializer: Fastify's default fields, with the URL redacted. */
export function serializeRequest(request: FastifyRequest) {
  return {
    method: request.method,
    url: redactWebhookToken(request.url),
    host: request.host,
    remoteAddress: request.ip,
    remotePort: request.socket.remotePort,
  };
}
