import { isNebEvent } from '../event.js';
import type { RawEvent } from '../event.js';
import type { AcceptancePredicate, AcceptanceCriteria, PredicateResult } from './types.js';

const PREDICATE_ID = 'downtime';

/**
 * Downtime predicate.
 *
 * Passes when `inDowntime >= scheduled_downtime_depth`. A neb event
 * without a numeric depth fails.
 *
 * Applies to every neb element (see state-type predicate).
 */
export function createDowntimePredicate(): AcceptancePredicate {
  return {
    id: PREDICATE_ID,
    description: 'Downtime depth must not exceed the in-downtime threshold',

    appliesTo: isNebEvent,

    check(event: RawEvent, criteria: AcceptanceCriteria): PredicateResult {
      const depth = isNebEvent(event) ? event.scheduled_downtime_depth : undefined;

      if (depth !== undefined && criteria.inDowntime >= depth) {
        return { passed: true, predicate: PREDICATE_ID };
      }

      return {
        passed: false,
        predicate: PREDICATE_ID,
        reason: depth === undefined
          ? 'Missing scheduled_downtime_depth'
          : `Downtime depth ${depth} above in-downtime threshold ${criteria.inDowntime}`,
      };
    },
  };
}
