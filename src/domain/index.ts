export type { DataSource, Broadcast, BroadcastUpdateFlags } from './datasource.js';
export type { Channel, Delivery, Route } from './notification.js';
export { BroadcastNotFoundError, AmbiguousBroadcastError, TableauApiError } from './errors.js';
