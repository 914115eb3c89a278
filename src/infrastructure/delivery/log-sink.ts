import type { Logger } from 'pino';
import type { NormalizedAlert } from '../../domain/index.js';
import type { AlertSink, DeliveryResult } from './alert-sink.js';

/**
 * Writes every alert to the structured log. Always on, so accepted
 * events are traceable even when no HTTP endpoint is configured.
 */
export function createLogSink(log: Logger): AlertSink {
  return {
    name: 'log',

    async deliver(alert: NormalizedAlert): Promise<DeliveryResult> {
      log.info({ alert }, 'Alert ready for delivery');
      return { sink: 'log', delivered: true };
    },
  };
}
