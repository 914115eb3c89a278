import { isNebEvent } from '../event.js';
import type { RawEvent } from '../event.js';
import type { AcceptancePredicate, AcceptanceCriteria, PredicateResult } from './types.js';

const PREDICATE_ID = 'acknowledgement';

/**
 * Acknowledgment predicate.
 *
 * Passes when `acknowledged threshold >= numeric(event.acknowledged)`.
 * With the default threshold 0 only unacknowledged events pass; 1 lets
 * acknowledged ones through too. A missing flag counts as not acknowledged.
 *
 * Applies to every neb element (see state-type predicate).
 */
export function createAcknowledgementPredicate(): AcceptancePredicate {
  return {
    id: PREDICATE_ID,
    description: 'Acknowledged events pass only when the acknowledged threshold allows it',

    appliesTo: isNebEvent,

    check(event: RawEvent, criteria: AcceptanceCriteria): PredicateResult {
      const acknowledged = isNebEvent(event) && event.acknowledged === true ? 1 : 0;

      if (criteria.acknowledged >= acknowledged) {
        return { passed: true, predicate: PREDICATE_ID };
      }

      return {
        passed: false,
        predicate: PREDICATE_ID,
        reason: `Event is acknowledged (threshold ${criteria.acknowledged})`,
      };
    },
  };
}
