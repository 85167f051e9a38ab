import type { Logger } from 'pino';
import type { TableauClient, TableauSession } from './ports.js';

/**
 * Ends a Tableau session without letting a failed sign-out replace the
 * outcome of the work done inside it. The session expires server-side.
 */
export async function signOutQuietly(
  tableau: TableauClient,
  session: TableauSession,
  log: Logger,
): Promise<void> {
  try {
    await tableau.signOut(session);
  } catch (err: unknown) {
    log.warn({ err, site_id: session.siteId }, 'Tableau sign-out failed');
  }
}
