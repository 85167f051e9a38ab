/**
 * Tableau-side entities this service reads.
 *
 * These are owned by the BI platform; the service never mutates a
 * datasource and only touches a broadcast through the update operation.
 */

/** A published datasource as reported by the site listing. */
export interface DataSource {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly updatedAt: string; // ISO-8601, as reported by Tableau
}

/** A broadcast view of a workbook. */
export interface Broadcast {
  readonly id: string;
  readonly name: string;
  readonly workbookId: string;
}

/** Toggles sent with a broadcast update. Their meaning is defined by Tableau. */
export interface BroadcastUpdateFlags {
  readonly suspended: boolean;
  readonly notifyViewers: boolean;
}
