import { once } from 'node:events';
import pino from 'pino';
import type { Logger } from 'pino';
import type { AuditLog, DatasourceReport } from '../../application/ports.js';

/**
 * Audit trail backed by a pino file destination.
 *
 * One destination per process serializes every entry into whole JSON
 * lines, appended in call order, so concurrent requests cannot tear
 * each other's entries. The file is opened for append and never rotated.
 *
 * Resolves once the file is open and rejects if it cannot be opened.
 * Later write errors are reported through `log`.
 */
export async function createFileAuditLog(
  path: string,
  log: Logger,
  options: { sync?: boolean } = {},
): Promise<AuditLog> {
  const sync = options.sync ?? false;

  // In sync mode a failed open throws from the constructor
  const destination = pino.destination({
    dest: path,
    append: true,
    mkdir: true,
    sync,
  });

  if (!sync) await once(destination, 'ready');

  destination.on('error', (err: unknown) => {
    log.error({ err, path }, 'Audit log write failed');
  });

  const audit = pino(
    {
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );

  return {
    siteSummary(total: number): void {
      audit.info(
        { event: 'site_summary', total },
        `There are ${total} datasources on site`,
      );
    },

    datasourceReport(report: DatasourceReport): void {
      audit.info(
        {
          event: 'datasource_report',
          datasource: {
            id: report.datasource.id,
            name: report.datasource.name,
            updated_at: report.datasource.updatedAt,
          },
          deliveries: report.deliveries,
        },
        report.message,
      );
    },

    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        destination.once('close', () => resolve());
        destination.once('error', reject);
        // end() writes whatever is still buffered before closing the fd
        destination.end();
      });
    },
  };
}
