export { AcceptanceEvaluator } from './acceptance-evaluator.js';
export type { Acceptance, PredicateFailure } from './acceptance-evaluator.js';
export { ClassificationEngine } from './classification-engine.js';
export type { Classification, IngestResult, AlertHandler, ClassificationEngineOptions } from './classification-engine.js';
export {
  connectorParametersSchema,
  normalizeConnectorParameters,
  parseConnectorConfig,
  describeConfig,
  DEFAULT_CONFIG,
  KNOWN_PARAMETERS,
  LOG_LEVELS,
} from './connector-config.js';
export type { ConnectorConfig, ConnectorParameters, LogLevel } from './connector-config.js';
export { decodeBrokerEvent, eventKind, envelopeSchema } from './event-schema.js';
export type { DecodeResult } from './event-schema.js';
export { EngineStore } from './engine-store.js';
export { resolveHostname, resolveServiceDescription, UNKNOWN_NAME } from './name-resolution.js';
export type { NameLookup } from './name-resolution.js';
export { formatEventTime } from './time-format.js';
