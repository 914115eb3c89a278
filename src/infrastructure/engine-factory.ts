import type { Logger } from 'pino';
import {
  ClassificationEngine,
  DEFAULT_CONFIG,
  describeConfig,
  parseConnectorConfig,
} from '../application/index.js';
import type { ConnectorParameters, NameLookup } from '../application/index.js';
import { loadConnectorParameters } from './config/index.js';
import { createAlertDispatcher, createSinks } from './delivery/index.js';

/**
 * Builds a classification engine from flat parameters, wired to the
 * delivery sinks the parameters select.
 */
export function buildEngine(
  params: ConnectorParameters,
  names: NameLookup,
  log: Logger,
): ClassificationEngine {
  const config = parseConnectorConfig(params, log);

  if (config.maxBufferSize !== DEFAULT_CONFIG.maxBufferSize || config.maxBufferAge !== DEFAULT_CONFIG.maxBufferAge) {
    log.info(
      { maxBufferSize: config.maxBufferSize, maxBufferAge: config.maxBufferAge },
      'Buffer settings accepted but inactive, alerts are delivered one at a time',
    );
  }

  log.info({ config: describeConfig(config) }, 'Connector configuration loaded');

  return new ClassificationEngine({
    config,
    names,
    log,
    deliver: createAlertDispatcher(createSinks(config, log), log),
  });
}

/** Reads the parameter file and builds an engine from it. */
export function loadEngine(names: NameLookup, log: Logger, configPath?: string): ClassificationEngine {
  return buildEngine(loadConnectorParameters(log, configPath), names, log);
}

/** LOG_LEVEL wins; otherwise the connector's log_level parameter sets the level. */
export function applyConfiguredLevel(log: Logger, engine: ClassificationEngine): void {
  if (process.env['LOG_LEVEL'] === undefined) {
    log.level = engine.config.logLevel;
  }
}
