export type { AlertSink, DeliveryResult } from './alert-sink.js';
export { createLogSink } from './log-sink.js';
export { createWebhookSink } from './webhook-sink.js';
export { createSinks, createAlertDispatcher } from './dispatcher.js';
