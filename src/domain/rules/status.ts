import type { RawEvent } from '../event.js';
import type { AcceptancePredicate, AcceptanceCriteria, PredicateResult } from './types.js';

const PREDICATE_ID = 'status';

/**
 * Status predicate.
 *
 * The event's raw `state` must be one of the configured codes. Host and
 * service status events are checked against separate sets.
 */
export function createStatusPredicate(): AcceptancePredicate {
  return {
    id: PREDICATE_ID,
    description: 'Raw state must be in the accepted host/service status set',

    appliesTo(event: RawEvent): boolean {
      return event.kind === 'host_status' || event.kind === 'service_status';
    },

    check(event: RawEvent, criteria: AcceptanceCriteria): PredicateResult {
      if (event.kind !== 'host_status' && event.kind !== 'service_status') {
        return { passed: true, predicate: PREDICATE_ID };
      }

      const accepted = event.kind === 'host_status'
        ? criteria.hostStatuses
        : criteria.serviceStatuses;

      if (accepted.has(event.state)) {
        return { passed: true, predicate: PREDICATE_ID };
      }

      return {
        passed: false,
        predicate: PREDICATE_ID,
        reason: `State ${event.state} not in accepted ${event.kind} set [${[...accepted].join(',')}]`,
      };
    },
  };
}
