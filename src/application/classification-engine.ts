import type { Logger } from 'pino';
import {
  ALERT_SOURCE,
  ALERT_EVENT_CLASS,
  categoryAccepted,
  elementAccepted,
  mapSeverity,
} from '../domain/index.js';
import type { NormalizedAlert, RawEvent } from '../domain/index.js';
import { AcceptanceEvaluator } from './acceptance-evaluator.js';
import type { PredicateFailure } from './acceptance-evaluator.js';
import type { ConnectorConfig } from './connector-config.js';
import { decodeBrokerEvent } from './event-schema.js';
import { resolveHostname, resolveServiceDescription } from './name-resolution.js';
import type { NameLookup } from './name-resolution.js';
import { formatEventTime } from './time-format.js';

export type Classification =
  | { readonly accepted: true; readonly alert: NormalizedAlert }
  | { readonly accepted: false; readonly failures: readonly PredicateFailure[] };

export type IngestResult =
  | { readonly status: 'undecodable'; readonly issues: readonly string[] }
  | { readonly status: 'rejected'; readonly failures: readonly PredicateFailure[] }
  | { readonly status: 'accepted'; readonly alert: NormalizedAlert };

/** Receives each accepted alert. Must not throw; delivery errors are its own concern. */
export type AlertHandler = (alert: NormalizedAlert) => void;

export interface ClassificationEngineOptions {
  config: ConnectorConfig;
  names: NameLookup;
  log: Logger;
  deliver?: AlertHandler | undefined;
  evaluator?: AcceptanceEvaluator | undefined;
  /** Clock used when an event has no last_check. Injectable for tests. */
  nowFn?: (() => number) | undefined;
}

/**
 * Classification engine.
 *
 * Holds one immutable configuration and turns broker events into
 * normalized alerts:
 * 1. `filter()` — cheap check on (category, element), before the payload is decoded.
 * 2. `write()` / `ingest()` — decode → evaluate acceptance → map → hand to delivery.
 *
 * No state is carried from one event to the next.
 */
export class ClassificationEngine {
  readonly config: ConnectorConfig;
  private readonly names: NameLookup;
  private readonly log: Logger;
  private readonly deliver: AlertHandler | undefined;
  private readonly evaluator: AcceptanceEvaluator;
  private readonly nowFn: () => number;

  constructor(options: ClassificationEngineOptions) {
    this.config = options.config;
    this.names = options.names;
    this.log = options.log;
    this.deliver = options.deliver;
    this.evaluator = options.evaluator ?? new AcceptanceEvaluator();
    this.nowFn = options.nowFn ?? Date.now;
  }

  /** True when the category and the element are both configured as accepted. */
  preFilter(category: number, element: number): boolean {
    return categoryAccepted(this.config.acceptedCategories, category)
      && elementAccepted(this.config.acceptedElements, category, element);
  }

  /** Evaluates acceptance and, when accepted, builds the normalized alert. */
  classify(event: RawEvent): Classification {
    const acceptance = this.evaluator.evaluate(this.config, event);
    if (!acceptance.accepted) {
      return { accepted: false, failures: acceptance.failures };
    }

    return { accepted: true, alert: this.toAlert(event) };
  }

  /** Boundary pre-filter: false means the payload should not be sent to `write()`. */
  filter(category: number, element: number): boolean {
    const accepted = this.preFilter(category, element);
    if (accepted) {
      this.log.debug({ category, element }, 'Event passed pre-filter');
    }
    return accepted;
  }

  /**
   * Decodes, classifies and, when accepted, delivers one broker payload.
   * Reports which stage dropped the event.
   */
  ingest(payload: unknown): IngestResult {
    const decoded = decodeBrokerEvent(payload);
    if (!decoded.success) {
      const issues = decoded.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      this.log.warn({ issues }, 'Undecodable broker event, dropping');
      return { status: 'undecodable', issues };
    }

    const { event } = decoded;
    const result = this.classify(event);
    if (!result.accepted) {
      this.log.debug(
        { category: event.category, element: event.element, failures: result.failures },
        'Event rejected',
      );
      return { status: 'rejected', failures: result.failures };
    }

    this.log.debug({ alert: result.alert }, 'Event accepted');
    this.deliver?.(result.alert);
    return { status: 'accepted', alert: result.alert };
  }

  /**
   * Boundary write: true when the payload decoded, was accepted and was
   * handed to delivery; false if it was dropped at any stage.
   */
  write(payload: unknown): boolean {
    return this.ingest(payload).status === 'accepted';
  }

  private toAlert(event: RawEvent): NormalizedAlert {
    const node = resolveHostname(this.names, this.log, event.host_id);
    const isHost = event.kind === 'host_status';

    return {
      source: ALERT_SOURCE,
      event_class: ALERT_EVENT_CLASS,
      node,
      // Host status alerts are about the host itself; everything else about a service
      resource: isHost
        ? node
        : resolveServiceDescription(this.names, this.log, event.host_id, event.service_id),
      severity: mapSeverity(isHost ? 'host' : 'service', event.current_state),
      description: event.output ?? '',
      time_of_event: formatEventTime(this.eventTime(event)),
    };
  }

  /** Epoch milliseconds of the check; the clock when it is absent or out of Date range. */
  private eventTime(event: RawEvent): number {
    if (event.last_check === undefined) return this.nowFn();
    const epochMs = event.last_check * 1000;
    return Number.isNaN(new Date(epochMs).getTime()) ? this.nowFn() : epochMs;
  }
}
