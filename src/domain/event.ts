/**
 * Broker event model.
 *
 * A raw broker payload is decoded into one of these variants, selected by
 * its (category, element) pair. Status variants carry their rule fields as
 * required; everything else stays optional because the broker only fills
 * what the element type actually has.
 */

interface BrokerEventBase {
  readonly category: number;
  readonly element: number;
  readonly host_id?: number | undefined;
  readonly service_id?: number | undefined;
  readonly current_state?: number | undefined;
  /** Epoch seconds. */
  readonly last_check?: number | undefined;
  readonly output?: string | undefined;
}

/** Fields the neb rule set reads. */
interface StatusFields {
  readonly state: number;
  /** 0 = soft, 1 = hard. */
  readonly state_type: number;
  readonly acknowledged: boolean;
  readonly scheduled_downtime_depth: number;
}

export interface HostStatusEvent extends BrokerEventBase, StatusFields {
  readonly kind: 'host_status';
  readonly host_id: number;
}

/** `host_id` is absent on anonymous service events. */
export interface ServiceStatusEvent extends BrokerEventBase, StatusFields {
  readonly kind: 'service_status';
  readonly service_id: number;
}

/** Any other neb element (log_entry, acknowledgement, downtime, ...). */
export interface NebEvent extends BrokerEventBase {
  readonly kind: 'neb';
  readonly state?: number | undefined;
  readonly state_type?: number | undefined;
  readonly acknowledged?: boolean | undefined;
  readonly scheduled_downtime_depth?: number | undefined;
}

export interface StorageEvent extends BrokerEventBase {
  readonly kind: 'storage';
}

export interface BamEvent extends BrokerEventBase {
  readonly kind: 'bam';
}

/** Categories the connector has no rules for (bbdo, correlation, ...). */
export interface UnrecognizedEvent extends BrokerEventBase {
  readonly kind: 'unrecognized';
}

export type RawEvent =
  | HostStatusEvent
  | ServiceStatusEvent
  | NebEvent
  | StorageEvent
  | BamEvent
  | UnrecognizedEvent;

export type RawEventKind = RawEvent['kind'];

export function isNebEvent(event: RawEvent): event is HostStatusEvent | ServiceStatusEvent | NebEvent {
  return event.kind === 'host_status' || event.kind === 'service_status' || event.kind === 'neb';
}
