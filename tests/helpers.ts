import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  AuditLog,
  DatasourceReport,
  NotificationGateway,
  OutboundCall,
  OutboundMessage,
  TableauClient,
  TableauSession,
} from '../src/application/index.js';
import type { Broadcast, BroadcastUpdateFlags, DataSource } from '../src/domain/index.js';
import { loadConfig } from '../src/infrastructure/index.js';
import type { AppConfig } from '../src/infrastructure/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** A complete, valid environment with placeholder credentials. */
export const TEST_ENV: Record<string, string> = {
  TABLEAU_USERNAME: 'analyst@example.com',
  TABLEAU_PAT_NAME: 'pat-name',
  TABLEAU_PAT_SECRET: 'test-secret',
  TABLEAU_CA_CLIENT: 'client-123',
  TABLEAU_CA_SECRET_ID: 'secret-id-456',
  TABLEAU_CA_SECRET_VALUE: 'test-ca-secret',
  TABLEAU_SITENAME: 'mysite',
  TABLEAU_SERVER: 'https://tableau.example.com',
  TWILIO_ACCOUNT_SID: 'AC-test',
  TWILIO_AUTH_TOKEN: 'test-token',
  TWILIO_FROM_NUMBER: '+15550000001',
  TWILIO_TO_NUMBER: '+15550000002',
  WHATSAPP_FROM: 'whatsapp:+15550000003',
  WHATSAPP_TO: 'whatsapp:+15550000004',
};

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

export const SESSION: TableauSession = {
  token: 'session-token',
  siteId: 'site-1',
  userId: 'user-1',
};

let counter = 0;

/** Factory for datasources with sensible defaults. */
export function makeDatasource(overrides: Partial<DataSource> = {}): DataSource {
  counter++;
  return {
    id: overrides.id ?? `ds-${counter}`,
    name: overrides.name ?? `Datasource ${counter}`,
    description: overrides.description ?? 'Nightly extract',
    updatedAt: overrides.updatedAt ?? '2026-03-01T09:00:00Z',
  };
}

export function fakeTableau(
  datasources: DataSource[] = [],
  broadcasts: Broadcast[] = [],
) {
  return {
    signInWithPersonalAccessToken: vi.fn(async (_name: string, _secret: string) => SESSION),
    signInWithJwt: vi.fn(async (_token: string) => SESSION),
    signOut: vi.fn(async (_session: TableauSession) => undefined),
    listDatasources: vi.fn(async (_session: TableauSession) => ({
      datasources,
      totalAvailable: datasources.length,
    })),
    listBroadcasts: vi.fn(async (_session: TableauSession): Promise<readonly Broadcast[]> => broadcasts),
    updateBroadcast: vi.fn(
      async (_session: TableauSession, _id: string, _flags: BroadcastUpdateFlags) => undefined,
    ),
  } satisfies TableauClient;
}

export function fakeGateway() {
  let sids = 0;
  return {
    sendMessage: vi.fn(async (_message: OutboundMessage) => ({ sid: `SM${++sids}` })),
    placeCall: vi.fn(async (_call: OutboundCall) => ({ sid: `CA${++sids}` })),
  } satisfies NotificationGateway;
}

export function fakeAudit() {
  return {
    siteSummary: vi.fn((_total: number) => undefined),
    datasourceReport: vi.fn((_report: DatasourceReport) => undefined),
    close: vi.fn(async () => undefined),
  } satisfies AuditLog;
}
