import type { RawEvent } from '../event.js';
import type { AcceptancePredicate, AcceptanceCriteria, PredicateResult } from './types.js';

const PREDICATE_ID = 'anonymous-host';

/**
 * Anonymous-host predicate.
 *
 * A service status event without a host id fails when anonymous events
 * are skipped. The evaluator runs it before anything else and stops on
 * failure.
 */
export function createAnonymousHostPredicate(): AcceptancePredicate {
  return {
    id: PREDICATE_ID,
    description: 'Service events without a host id are skipped when skip_anon_events is set',

    appliesTo(event: RawEvent): boolean {
      return event.kind === 'service_status';
    },

    check(event: RawEvent, criteria: AcceptanceCriteria): PredicateResult {
      if (event.host_id === undefined && criteria.skipAnonymousEvents) {
        return {
          passed: false,
          predicate: PREDICATE_ID,
          reason: `Service ${event.service_id ?? '?'} has no host id`,
        };
      }

      return { passed: true, predicate: PREDICATE_ID };
    },
  };
}
