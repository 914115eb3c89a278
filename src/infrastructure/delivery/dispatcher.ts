import type { Logger } from 'pino';
import type { NormalizedAlert } from '../../domain/index.js';
import type { AlertHandler } from '../../application/index.js';
import type { ConnectorConfig } from '../../application/index.js';
import type { AlertSink } from './alert-sink.js';
import { createLogSink } from './log-sink.js';
import { createWebhookSink } from './webhook-sink.js';

/** Log sink always; webhook sink when `http_server_url` is configured. */
export function createSinks(config: ConnectorConfig, log: Logger): AlertSink[] {
  const sinks: AlertSink[] = [createLogSink(log)];
  if (config.httpServerUrl !== undefined) {
    sinks.push(createWebhookSink(config.httpServerUrl, log));
  }
  return sinks;
}

/**
 * Dispatches an alert to every sink.
 *
 * Each sink runs independently and fire-and-forget — a failure in one
 * does not prevent the others, and classification never waits on delivery.
 */
export function createAlertDispatcher(sinks: readonly AlertSink[], log: Logger): AlertHandler {
  return (alert: NormalizedAlert): void => {
    for (const sink of sinks) {
      void sink.deliver(alert).catch((err: unknown) => {
        log.warn({ err, sink: sink.name }, 'Alert sink failed');
      });
    }
  };
}
