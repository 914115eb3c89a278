import type { RawEvent } from '../event.js';

/** 0 or 1; used both as a flag and as a comparison threshold. */
export type BinaryFlag = 0 | 1;

/**
 * The part of the connector configuration the acceptance predicates read.
 *
 * Thresholds compare against event fields:
 * - `hardOnly`: state_type must be >= this value.
 * - `acknowledged`: must be >= the event's acknowledgment (false → 0, true → 1).
 * - `inDowntime`: must be >= the event's scheduled_downtime_depth.
 */
export interface AcceptanceCriteria {
  readonly hostStatuses: ReadonlySet<number>;
  readonly serviceStatuses: ReadonlySet<number>;
  readonly hardOnly: BinaryFlag;
  readonly acknowledged: BinaryFlag;
  readonly inDowntime: BinaryFlag;
  readonly skipAnonymousEvents: boolean;
}

export type PredicateId =
  | 'category'
  | 'anonymous-host'
  | 'status'
  | 'state-type'
  | 'acknowledgement'
  | 'downtime';

/**
 * Result of checking one predicate against an event.
 *
 * `passed === false` carries a human-readable reason for diagnostics.
 */
export type PredicateResult =
  | { readonly passed: true; readonly predicate: PredicateId }
  | { readonly passed: false; readonly predicate: PredicateId; readonly reason: string };

/**
 * An acceptance predicate is a pure, deterministic check.
 *
 * `appliesTo` scopes it to the event kinds it constrains; the evaluator
 * only calls `check` on events it applies to.
 */
export interface AcceptancePredicate {
  readonly id: PredicateId;
  readonly description: string;
  appliesTo(event: RawEvent): boolean;
  check(event: RawEvent, criteria: AcceptanceCriteria): PredicateResult;
}
