import {
  createAnonymousHostPredicate,
  createStatusPredicate,
  createStateTypePredicate,
  createAcknowledgementPredicate,
  createDowntimePredicate,
} from '../domain/index.js';
import type {
  AcceptanceCriteria,
  AcceptancePredicate,
  PredicateId,
  RawEvent,
} from '../domain/index.js';

export interface PredicateFailure {
  readonly predicate: PredicateId;
  readonly reason: string;
}

export type Acceptance =
  | { readonly accepted: true }
  | { readonly accepted: false; readonly failures: readonly PredicateFailure[] };

const ACCEPTED: Acceptance = { accepted: true };

/**
 * Acceptance rule evaluator.
 *
 * Dispatch by category:
 * - neb: anonymous-host gate, then every applicable predicate. All of them
 *   are evaluated so the rejection lists each failure.
 * - storage, bam: always accepted. No business rules exist for them yet.
 * - anything else: rejected.
 *
 * Stateless: the same event and criteria always give the same answer.
 */
export class AcceptanceEvaluator {
  private readonly gate: AcceptancePredicate;
  private readonly predicates: readonly AcceptancePredicate[];

  constructor(
    predicates: readonly AcceptancePredicate[] = AcceptanceEvaluator.defaults(),
    gate: AcceptancePredicate = createAnonymousHostPredicate(),
  ) {
    this.predicates = predicates;
    this.gate = gate;
  }

  evaluate(criteria: AcceptanceCriteria, event: RawEvent): Acceptance {
    switch (event.kind) {
      case 'storage':
      case 'bam':
        return ACCEPTED;

      case 'unrecognized':
        return {
          accepted: false,
          failures: [{ predicate: 'category', reason: `No acceptance rules for category ${event.category}` }],
        };

      case 'host_status':
      case 'service_status':
      case 'neb':
        return this.evaluateNeb(criteria, event);
    }
  }

  private evaluateNeb(criteria: AcceptanceCriteria, event: RawEvent): Acceptance {
    // Short-circuit: nothing else is looked at for anonymous events
    if (this.gate.appliesTo(event)) {
      const gateResult = this.gate.check(event, criteria);
      if (!gateResult.passed) {
        return { accepted: false, failures: [{ predicate: gateResult.predicate, reason: gateResult.reason }] };
      }
    }

    const failures: PredicateFailure[] = [];
    for (const predicate of this.predicates) {
      if (!predicate.appliesTo(event)) continue;

      const result = predicate.check(event, criteria);
      if (!result.passed) {
        failures.push({ predicate: result.predicate, reason: result.reason });
      }
    }

    return failures.length === 0 ? ACCEPTED : { accepted: false, failures };
  }

  /** Neb rule set: status, state type, acknowledgment, downtime. */
  static defaults(): AcceptancePredicate[] {
    return [
      createStatusPredicate(),
      createStateTypePredicate(),
      createAcknowledgementPredicate(),
      createDowntimePredicate(),
    ];
  }
}
