import { isNebEvent } from '../event.js';
import type { RawEvent } from '../event.js';
import type { AcceptancePredicate, AcceptanceCriteria, PredicateResult } from './types.js';

const PREDICATE_ID = 'state-type';

/**
 * Hard/soft state predicate.
 *
 * Passes when `state_type >= hardOnly`: with hardOnly = 1 soft states
 * (0) are dropped. A neb event without a numeric state_type fails.
 *
 * NOTE: applies to every neb element, not only host/service status.
 * Whether log_entry & co. should be exempt is an open product question;
 * the uniform behaviour is kept until that is decided.
 */
export function createStateTypePredicate(): AcceptancePredicate {
  return {
    id: PREDICATE_ID,
    description: 'State type must be at least the hard-only threshold',

    appliesTo: isNebEvent,

    check(event: RawEvent, criteria: AcceptanceCriteria): PredicateResult {
      const stateType = isNebEvent(event) ? event.state_type : undefined;

      if (stateType !== undefined && stateType >= criteria.hardOnly) {
        return { passed: true, predicate: PREDICATE_ID };
      }

      return {
        passed: false,
        predicate: PREDICATE_ID,
        reason: stateType === undefined
          ? 'Missing state_type'
          : `State type ${stateType} below hard-only threshold ${criteria.hardOnly}`,
      };
    },
  };
}
