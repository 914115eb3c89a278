import { z } from 'zod';
import type { Logger } from 'pino';
import { isCategoryName, isKnownElementName } from '../domain/index.js';
import type { AcceptanceCriteria, BinaryFlag, CategoryName } from '../domain/index.js';

/**
 * Raw connector parameters, as they come out of the parameter file: a flat
 * key/value object. Values are checked one by one in
 * `normalizeConnectorParameters`.
 */
export const connectorParametersSchema = z.record(z.string(), z.unknown());

export type ConnectorParameters = Readonly<Record<string, string>>;

/**
 * Normalizes scalar values to their string form ("1"/"0" for booleans) so
 * every option is parsed the same way. A non-scalar value drops only its own
 * key, with a warning.
 */
export function normalizeConnectorParameters(
  raw: Readonly<Record<string, unknown>>,
  log: Logger,
): ConnectorParameters {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'boolean') {
      normalized[key] = value ? '1' : '0';
    } else if (typeof value === 'string' || typeof value === 'number') {
      normalized[key] = String(value);
    } else {
      log.warn({ parameter: key, value }, 'Ignoring non-scalar connector parameter');
    }
  }
  return normalized;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Validated, immutable connector configuration.
 *
 * Built once from parameters and never mutated; a reload builds a new one.
 * `maxBufferSize` / `maxBufferAge` are accepted but inert: alerts are
 * delivered one by one, no batching takes place.
 */
export interface ConnectorConfig extends AcceptanceCriteria {
  readonly acceptedCategories: ReadonlySet<CategoryName>;
  readonly acceptedElements: ReadonlySet<string>;
  readonly maxBufferSize: number;
  /** Seconds. */
  readonly maxBufferAge: number;
  readonly httpServerUrl: string | undefined;
  readonly logLevel: LogLevel;
}

/** Parameter names this connector understands. Anything else is logged and ignored. */
export const KNOWN_PARAMETERS = [
  'host_status',
  'service_status',
  'hard_only',
  'acknowledged',
  'in_downtime',
  'element_type',
  'category_type',
  'skip_anon_events',
  'max_buffer_size',
  'max_buffer_age',
  'http_server_url',
  'log_level',
] as const;

type KnownParameter = (typeof KNOWN_PARAMETERS)[number];

function isKnownParameter(key: string): key is KnownParameter {
  return KNOWN_PARAMETERS.some((known) => known === key);
}

export const DEFAULT_CONFIG: ConnectorConfig = Object.freeze<ConnectorConfig>({
  acceptedCategories: new Set<CategoryName>(['neb', 'storage']),
  acceptedElements: new Set(['metric']),
  hostStatuses: new Set([0, 1, 2]),
  serviceStatuses: new Set([0, 1, 2, 3]),
  hardOnly: 1,
  acknowledged: 0,
  inDowntime: 0,
  skipAnonymousEvents: true,
  maxBufferSize: 1,
  maxBufferAge: 5,
  httpServerUrl: undefined,
  logLevel: 'info',
});

const binaryFlagSchema = z
  .string()
  .trim()
  .pipe(z.enum(['0', '1']))
  .transform((value): BinaryFlag => (value === '1' ? 1 : 0));

const positiveIntSchema = z.string().trim().pipe(z.coerce.number().int().positive());

const urlSchema = z.string().trim().url().optional();

const logLevelSchema = z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS));

/**
 * Parses one option with `schema`, falling back to `fallback` (with a
 * warning) when the value is present but invalid.
 */
function option<T>(
  params: ConnectorParameters,
  key: KnownParameter,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
  log: Logger,
): T {
  const raw = params[key];
  if (raw === undefined) return fallback;

  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  log.warn(
    { parameter: key, value: raw, fallback, issues: parsed.error.issues.map((i) => i.message) },
    'Invalid connector parameter, using default',
  );
  return fallback;
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token !== '');
}

/** Comma-separated status codes; non-numeric tokens are dropped. */
function statusSet(
  params: ConnectorParameters,
  key: 'host_status' | 'service_status',
  fallback: ReadonlySet<number>,
  log: Logger,
): ReadonlySet<number> {
  const raw = params[key];
  if (raw === undefined) return fallback;

  const codes = new Set<number>();
  for (const token of splitList(raw)) {
    if (/^\d+$/.test(token)) {
      codes.add(Number(token));
    } else {
      log.warn({ parameter: key, token }, 'Ignoring non-numeric status code');
    }
  }
  return codes;
}

/** Comma-separated names; names `isKnown` refuses are dropped. */
function nameList(
  params: ConnectorParameters,
  key: 'category_type' | 'element_type',
  isKnown: (name: string) => boolean,
  log: Logger,
): string[] | undefined {
  const raw = params[key];
  if (raw === undefined) return undefined;

  return splitList(raw).filter((token) => {
    if (isKnown(token)) return true;
    log.warn({ parameter: key, name: token }, 'Ignoring unknown taxonomy name');
    return false;
  });
}

function categorySet(params: ConnectorParameters, log: Logger): ReadonlySet<CategoryName> {
  const names = nameList(params, 'category_type', isCategoryName, log);
  return names === undefined ? DEFAULT_CONFIG.acceptedCategories : new Set(names.filter(isCategoryName));
}

function elementSet(params: ConnectorParameters, log: Logger): ReadonlySet<string> {
  return new Set(nameList(params, 'element_type', isKnownElementName, log) ?? DEFAULT_CONFIG.acceptedElements);
}

/**
 * Builds the connector configuration from flat parameters.
 *
 * Every recognized option is logged; unrecognized ones are logged and
 * ignored. Malformed values never throw: each falls back to its default.
 */
export function parseConnectorConfig(params: ConnectorParameters, log: Logger): ConnectorConfig {
  for (const [key, value] of Object.entries(params)) {
    if (isKnownParameter(key)) {
      log.info({ parameter: key, value }, 'Connector parameter set');
    } else {
      log.info({ parameter: key, value }, 'Ignoring unhandled connector parameter');
    }
  }

  const skipAnonymous = option(
    params,
    'skip_anon_events',
    binaryFlagSchema,
    DEFAULT_CONFIG.skipAnonymousEvents ? 1 : 0,
    log,
  );

  return Object.freeze<ConnectorConfig>({
    acceptedCategories: categorySet(params, log),
    acceptedElements: elementSet(params, log),
    hostStatuses: statusSet(params, 'host_status', DEFAULT_CONFIG.hostStatuses, log),
    serviceStatuses: statusSet(params, 'service_status', DEFAULT_CONFIG.serviceStatuses, log),
    hardOnly: option(params, 'hard_only', binaryFlagSchema, DEFAULT_CONFIG.hardOnly, log),
    acknowledged: option(params, 'acknowledged', binaryFlagSchema, DEFAULT_CONFIG.acknowledged, log),
    inDowntime: option(params, 'in_downtime', binaryFlagSchema, DEFAULT_CONFIG.inDowntime, log),
    skipAnonymousEvents: skipAnonymous === 1,
    maxBufferSize: option(params, 'max_buffer_size', positiveIntSchema, DEFAULT_CONFIG.maxBufferSize, log),
    maxBufferAge: option(params, 'max_buffer_age', positiveIntSchema, DEFAULT_CONFIG.maxBufferAge, log),
    httpServerUrl: option(params, 'http_server_url', urlSchema, DEFAULT_CONFIG.httpServerUrl, log),
    logLevel: option(params, 'log_level', logLevelSchema, DEFAULT_CONFIG.logLevel, log),
  });
}

/** JSON-friendly view of a config, for logs and the config endpoint. */
export function describeConfig(config: ConnectorConfig): Record<string, unknown> {
  return {
    category_type: [...config.acceptedCategories],
    element_type: [...config.acceptedElements],
    host_status: [...config.hostStatuses],
    service_status: [...config.serviceStatuses],
    hard_only: config.hardOnly,
    acknowledged: config.acknowledged,
    in_downtime: config.inDowntime,
    skip_anon_events: config.skipAnonymousEvents ? 1 : 0,
    max_buffer_size: config.maxBufferSize,
    max_buffer_age: config.maxBufferAge,
    http_server_url: config.httpServerUrl ?? null,
    log_level: config.logLevel,
  };
}
