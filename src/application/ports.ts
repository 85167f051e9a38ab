import type { Broadcast, BroadcastUpdateFlags, DataSource, Delivery } from '../domain/index.js';

/** An authenticated Tableau REST session. */
export interface TableauSession {
  readonly token: string;
  readonly siteId: string;
  readonly userId: string;
}

export interface DatasourceListing {
  readonly datasources: readonly DataSource[];
  /** Total reported by Tableau's pagination block. */
  readonly totalAvailable: number;
}

/** The subset of the Tableau REST API this service calls. */
export interface TableauClient {
  signInWithPersonalAccessToken(name: string, secret: string): Promise<TableauSession>;
  signInWithJwt(token: string): Promise<TableauSession>;
  signOut(session: TableauSession): Promise<void>;
  listDatasources(session: TableauSession): Promise<DatasourceListing>;
  listBroadcasts(session: TableauSession): Promise<readonly Broadcast[]>;
  updateBroadcast(
    session: TableauSession,
    broadcastId: string,
    flags: BroadcastUpdateFlags,
  ): Promise<void>;
}

export interface OutboundMessage {
  readonly body: string;
  readonly from: string;
  readonly to: string;
}

export interface OutboundCall {
  /** Text read out to the callee. */
  readonly say: string;
  readonly from: string;
  readonly to: string;
}

/** Vendor-side send operations. Both resolve with the vendor's resource SID. */
export interface NotificationGateway {
  sendMessage(message: OutboundMessage): Promise<{ sid: string }>;
  placeCall(call: OutboundCall): Promise<{ sid: string }>;
}

/** Report for one datasource: the message that was sent and how each channel went. */
export interface DatasourceReport {
  readonly datasource: DataSource;
  readonly message: string;
  readonly deliveries: readonly Delivery[];
}

/** Append-only audit trail of notification batches. */
export interface AuditLog {
  siteSummary(total: number): void;
  datasourceReport(report: DatasourceReport): void;
  /** Flushes pending entries and releases the sink. */
  close(): Promise<void>;
}
