export { default as contextPlugin } from './context-plugin.js';
export type { AppServices, AppContextOptions } from './context-plugin.js';
export { default as indexRoutes } from './index-routes.js';
export { default as broadcastRoutes } from './broadcast-routes.js';
export { default as notifierRoutes } from './notifier-routes.js';
export { redactWebhookToken, serializeRequest } from './request-serializer.js';
