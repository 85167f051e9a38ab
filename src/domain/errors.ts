/**
 * Domain errors carry an HTTP `statusCode` so Fastify's default error
 * handler can turn them into responses without a custom mapper.
 */

export class BroadcastNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(readonly workbookId: string) {
    super(`No broadcast found for workbook ${workbookId}`);
    this.name = 'BroadcastNotFoundError';
  }
}

export class AmbiguousBroadcastError extends Error {
  readonly statusCode = 409;

  constructor(
    readonly workbookId: string,
    readonly broadcastIds: readonly string[],
  ) {
    super(
      `Workbook ${workbookId} matches ${broadcastIds.length} broadcasts (${broadcastIds.join(', ')})`,
    );
    this.name = 'AmbiguousBroadcastError';
  }
}

/** A non-2xx answer from the Tableau REST API. Surfaced to callers as 502. */
export class TableauApiError extends Error {
  readonly statusCode = 502;

  constructor(
    readonly operation: string,
    readonly upstreamStatus: number,
    readonly detail: string,
  ) {
    super(`Tableau ${operation} failed with HTTP ${upstreamStatus}: ${detail}`);
    this.name = 'TableauApiError';
  }
}
