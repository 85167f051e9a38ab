import type { Logger } from 'pino';
import type { Channel, DataSource, Delivery, Route } from '../domain/index.js';
import type {
  AuditLog,
  DatasourceReport,
  NotificationGateway,
  TableauClient,
} from './ports.js';
import { signOutQuietly } from './sign-out.js';

export interface NotifierSettings {
  readonly personalAccessToken: { readonly name: string; readonly secret: string };
  readonly sms: Route;
  readonly whatsapp: Route;
}

export interface NotifierDeps {
  readonly tableau: TableauClient;
  readonly gateway: NotificationGateway;
  readonly audit: AuditLog;
  readonly log: Logger;
}

export interface NotificationBatchResult {
  readonly total: number;
  readonly sent: number;
  readonly failed: number;
  readonly reports: readonly DatasourceReport[];
}

/** Human-readable failure summary used as SMS/WhatsApp body and spoken text. */
export function formatFailureMessage(datasource: DataSource): string {
  return [
    'Datasource refresh failed',
    `\tName: ${datasource.name}`,
    `\tDescription: ${datasource.description}`,
    `\tLast updated: ${datasource.updatedAt}`,
    '',
  ].join('\n');
}

async function attempt(
  channel: Channel,
  route: Route,
  send: () => Promise<{ sid: string }>,
  log: Logger,
  datasourceId: string,
): Promise<Delivery> {
  try {
    const { sid } = await send();
    log.info({ channel, sid, datasource_id: datasourceId }, 'Notification sent');
    return { channel, from: route.from, to: route.to, status: 'sent', sid };
  } catch (err: unknown) {
    log.warn({ err, channel, datasource_id: datasourceId }, 'Notification failed');
    return {
      channel,
      from: route.from,
      to: route.to,
      status: 'failed',
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/**
 * Notifies on-call about every datasource on the site.
 *
 * Signs in with the personal access token, lists all datasources and,
 * for each one, sends SMS, WhatsApp and a voice call. A failed channel is
 * recorded and the batch carries on; the caller decides what a partial
 * failure means. Tableau errors (sign-in, listing) propagate.
 */
export async function notifyFailingDatasources(
  settings: NotifierSettings,
  deps: NotifierDeps,
): Promise<NotificationBatchResult> {
  const { tableau, gateway, audit, log } = deps;

  const session = await tableau.signInWithPersonalAccessToken(
    settings.personalAccessToken.name,
    settings.personalAccessToken.secret,
  );

  try {
    const { datasources, totalAvailable } = await tableau.listDatasources(session);
    audit.siteSummary(totalAvailable);
    log.info({ total: totalAvailable }, 'Datasources fetched');

    const reports: DatasourceReport[] = [];
    let sent = 0;
    let failed = 0;

    for (const datasource of datasources) {
      const message = formatFailureMessage(datasource);

      const deliveries: Delivery[] = [
        await attempt('sms', settings.sms, () =>
          gateway.sendMessage({ body: message, ...settings.sms }), log, datasource.id),
        await attempt('whatsapp', settings.whatsapp, () =>
          gateway.sendMessage({ body: message, ...settings.whatsapp }), log, datasource.id),
        await attempt('voice', settings.sms, () =>
          gateway.placeCall({ say: message, ...settings.sms }), log, datasource.id),
      ];

      for (const delivery of deliveries) {
        if (delivery.status === 'sent') sent++;
        else failed++;
      }

      const report: DatasourceReport = { datasource, message, deliveries };
      audit.datasourceReport(report);
      reports.push(report);
    }

    return { total: totalAvailable, sent, failed, reports };
  } finally {
    await signOutQuietly(tableau, session, log);
  }
}
