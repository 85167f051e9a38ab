export { loadConfig, ConfigError, REQUIRED_ENV } from './config/env.js';
export type { AppConfig, RequiredEnvName } from './config/env.js';
export { TableauRestClient } from './tableau/rest-client.js';
export type { TableauRestOptions } from './tableau/rest-client.js';
export { createTwilioClient, createTwilioGateway, buildSayTwiml } from './twilio/gateway.js';
export type { TwilioResources } from './twilio/gateway.js';
export { createFileAuditLog } from './audit/file-audit-log.js';
