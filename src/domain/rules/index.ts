export type {
  AcceptancePredicate,
  AcceptanceCriteria,
  BinaryFlag,
  PredicateId,
  PredicateResult,
} from './types.js';
export { createStatusPredicate } from './status.js';
export { createStateTypePredicate } from './state-type.js';
export { createAcknowledgementPredicate } from './acknowledgement.js';
export { createDowntimePredicate } from './downtime.js';
export { createAnonymousHostPredicate } from './anonymous-host.js';
