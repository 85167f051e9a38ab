import type { Logger } from 'pino';
import {
  AmbiguousBroadcastError,
  BroadcastNotFoundError,
} from '../domain/index.js';
import type { Broadcast, BroadcastUpdateFlags } from '../domain/index.js';
import {
  issueConnectedAppToken,
  verifyConnectedAppToken,
} from './connected-app-token.js';
import type { ConnectedAppCredentials } from './connected-app-token.js';
import type { TableauClient } from './ports.js';
import { signOutQuietly } from './sign-out.js';

/** Both toggles are always cleared when a refreshed workbook is pushed. */
export const BROADCAST_UPDATE_FLAGS: BroadcastUpdateFlags = {
  suspended: false,
  notifyViewers: false,
};

export interface BroadcastUpdaterDeps {
  readonly tableau: TableauClient;
  readonly log: Logger;
}

/**
 * Picks the broadcast attached to a workbook by exact id equality.
 * Zero or several matches are errors; nothing is guessed.
 */
export function findBroadcastForWorkbook(
  broadcasts: readonly Broadcast[],
  workbookId: string,
): Broadcast {
  const matches = broadcasts.filter((b) => b.workbookId === workbookId);
  const [match] = matches;

  if (match === undefined) {
    throw new BroadcastNotFoundError(workbookId);
  }
  if (matches.length > 1) {
    throw new AmbiguousBroadcastError(workbookId, matches.map((b) => b.id));
  }
  return match;
}

/**
 * Refreshes the broadcast of a workbook.
 *
 * Authenticates through the connected app (JWT), not the personal
 * access token. The token is decoded once before use as a self-check.
 */
export async function updateBroadcastForWorkbook(
  credentials: ConnectedAppCredentials,
  workbookId: string,
  deps: BroadcastUpdaterDeps,
): Promise<Broadcast> {
  const { tableau, log } = deps;

  const token = issueConnectedAppToken(credentials);
  const claims = verifyConnectedAppToken(token, credentials.secretValue);
  log.debug({ jti: claims.jti, exp: claims.exp }, 'Connected app token issued');

  const session = await tableau.signInWithJwt(token);

  try {
    const broadcasts = await tableau.listBroadcasts(session);
    const target = findBroadcastForWorkbook(broadcasts, workbookId);

    await tableau.updateBroadcast(session, target.id, BROADCAST_UPDATE_FLAGS);
    log.info(
      { broadcast_id: target.id, workbook_id: workbookId },
      'Broadcast updated',
    );

    return target;
  } finally {
    await signOutQuietly(tableau, session, log);
  }
}
