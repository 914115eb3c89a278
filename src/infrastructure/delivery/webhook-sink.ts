import type { Logger } from 'pino';
import type { NormalizedAlert } from '../../domain/index.js';
import type { AlertSink, DeliveryResult } from './alert-sink.js';

const SINK_NAME = 'webhook';

/**
 * POSTs the alert as JSON to the alerting API endpoint.
 *
 * One attempt per alert: a non-OK status or a network error is logged
 * and reported in the result, never thrown.
 */
export function createWebhookSink(url: string, log: Logger): AlertSink {
  return {
    name: SINK_NAME,

    async deliver(alert: NormalizedAlert): Promise<DeliveryResult> {
      try {
        const response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(alert),
        });

        if (response.ok) {
          log.info(
            { node: alert.node, resource: alert.resource, severity: alert.severity },
            'Alert delivered',
          );
          return { sink: SINK_NAME, delivered: true, status: response.status };
        }

        log.warn(
          { status: response.status, node: alert.node, resource: alert.resource },
          'Alerting endpoint returned non-OK status',
        );
        return { sink: SINK_NAME, delivered: false, status: response.status };
      } catch (err: unknown) {
        log.warn({ err, node: alert.node, resource: alert.resource }, 'Failed to deliver alert');
        return {
          sink: SINK_NAME,
          delivered: false,
          error: err instanceof Error ? err.message : String(err),
        };
      }
    },
  };
}
