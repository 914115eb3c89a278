import type { NormalizedAlert } from '../../domain/index.js';

export interface DeliveryResult {
  readonly sink: string;
  readonly delivered: boolean;
  readonly status?: number | undefined;
  readonly error?: string | undefined;
}

/**
 * Outbound delivery of normalized alerts.
 *
 * Implementations report failures in the result instead of throwing.
 */
export interface AlertSink {
  readonly name: string;
  deliver(alert: NormalizedAlert): Promise<DeliveryResult>;
}
