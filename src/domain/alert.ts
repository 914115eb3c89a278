/** Fixed origin markers expected by the alerting API. */
export const ALERT_SOURCE = 'centreon';
export const ALERT_EVENT_CLASS = 'centreon';

/**
 * Normalized alert handed to delivery.
 *
 * Field names follow the alerting API's event schema, hence snake_case.
 */
export interface NormalizedAlert {
  readonly source: typeof ALERT_SOURCE;
  readonly event_class: typeof ALERT_EVENT_CLASS;
  readonly node: string;
  readonly resource: string;
  /** 0 (clear) to 5, lower is more urgent except 0. */
  readonly severity: number;
  readonly description: string;
  /** "YYYY-MM-DD HH:MM:SS", UTC. */
  readonly time_of_event: string;
}
