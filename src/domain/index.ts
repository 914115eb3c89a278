export type {
  RawEvent,
  RawEventKind,
  HostStatusEvent,
  ServiceStatusEvent,
  NebEvent,
  StorageEvent,
  BamEvent,
  UnrecognizedEvent,
} from './event.js';
export { isNebEvent } from './event.js';
export type { NormalizedAlert } from './alert.js';
export { ALERT_SOURCE, ALERT_EVENT_CLASS } from './alert.js';
export type { ElementKind } from './severity.js';
export { mapSeverity, DEFAULT_SEVERITY } from './severity.js';
export type { CategoryName } from './taxonomy.js';
export {
  CATEGORIES,
  ELEMENTS,
  NEB,
  STORAGE,
  BAM,
  HOST_STATUS,
  SERVICE_STATUS,
  categoryId,
  categoryName,
  elementId,
  elementName,
  isCategoryName,
  isKnownElementName,
  categoryAccepted,
  elementAccepted,
} from './taxonomy.js';
export type {
  AcceptancePredicate,
  AcceptanceCriteria,
  BinaryFlag,
  PredicateId,
  PredicateResult,
} from './rules/index.js';
export {
  createStatusPredicate,
  createStateTypePredicate,
  createAcknowledgementPredicate,
  createDowntimePredicate,
  createAnonymousHostPredicate,
} from './rules/index.js';
