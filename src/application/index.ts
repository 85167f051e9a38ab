export {
  issueConnectedAppToken,
  verifyConnectedAppToken,
  TOKEN_AUDIENCE,
  TOKEN_SCOPES,
  TOKEN_TTL_SECONDS,
} from './connected-app-token.js';
export type { ConnectedAppClaims, ConnectedAppCredentials } from './connected-app-token.js';
export { notifyFailingDatasources, formatFailureMessage } from './notify-datasources.js';
export type { NotificationBatchResult, NotifierDeps, NotifierSettings } from './notify-datasources.js';
export {
  updateBroadcastForWorkbook,
  findBroadcastForWorkbook,
  BROADCAST_UPDATE_FLAGS,
} from './update-broadcast.js';
export type { BroadcastUpdaterDeps } from './update-broadcast.js';
export { tableauWebhookSchema } from './webhook-schema.js';
export type { TableauWebhook } from './webhook-schema.js';
export type {
  AuditLog,
  DatasourceListing,
  DatasourceReport,
  NotificationGateway,
  OutboundCall,
  OutboundMessage,
  TableauClient,
  TableauSession,
} from './ports.js';
