import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import { connectorParametersSchema, normalizeConnectorParameters } from '../../application/index.js';
import type { ConnectorParameters } from '../../application/index.js';

/** Default location of the connector parameter file, relative to the working directory. */
export function defaultParameterPath(): string {
  return process.env['CONNECTOR_CONFIG'] ?? resolve(process.cwd(), 'config', 'connector.json');
}

/**
 * Loads the flat connector parameters from a JSON file.
 *
 * A missing file means "all defaults" and yields an empty map. An
 * unreadable file, or one that is not a JSON object, is logged and also
 * yields an empty map. A bad value inside the object drops only its key.
 */
export function loadConnectorParameters(log: Logger, configPath?: string): ConnectorParameters {
  const filePath = configPath ?? defaultParameterPath();

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      log.info({ filePath }, 'No connector parameter file, using defaults');
    } else {
      log.warn({ err, filePath }, 'Failed to read connector parameter file, using defaults');
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    log.warn({ err, filePath }, 'Connector parameter file is not valid JSON, using defaults');
    return {};
  }

  const parsed = connectorParametersSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(
      { filePath, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
      'Connector parameter file must be a JSON object, using defaults',
    );
    return {};
  }

  return normalizeConnectorParameters(parsed.data, log);
}
