import { describe, it, expect, beforeEach } from 'vitest';
import {
  connectorParametersSchema,
  normalizeConnectorParameters,
  describeConfig,
  parseConnectorConfig,
  DEFAULT_CONFIG,
} from '../../src/application/index.js';
import { fakeLogger } from '../rules/helpers.js';

describe('connectorParametersSchema', () => {
  it('accepts any flat object', () => {
    expect(connectorParametersSchema.safeParse({ host_status: [0, 1] }).success).toBe(true);
  });

  it('rejects arrays and scalars', () => {
    expect(connectorParametersSchema.safeParse([{ hard_only: 1 }]).success).toBe(false);
    expect(connectorParametersSchema.safeParse('hard_only=1').success).toBe(false);
  });
});

describe('normalizeConnectorParameters', () => {
  it('normalizes numbers and booleans to strings', () => {
    const parsed = normalizeConnectorParameters(
      { hard_only: true, skip_anon_events: false, max_buffer_size: 10, element_type: 'metric' },
      fakeLogger(),
    );

    expect(parsed).toEqual({
      hard_only: '1',
      skip_anon_events: '0',
      max_buffer_size: '10',
      element_type: 'metric',
    });
  });

  it('drops only the keys whose value is not a scalar', () => {
    const log = fakeLogger();

    const parsed = normalizeConnectorParameters({ host_status: [0, 1], http_server_url: null, hard_only: 0 }, log);

    expect(parsed).toEqual({ hard_only: '0' });
    expect(log.warn).toHaveBeenCalledWith(
      { parameter: 'host_status', value: [0, 1] },
      'Ignoring non-scalar connector parameter',
    );
    expect(log.warn).toHaveBeenCalledWith(
      { parameter: 'http_server_url', value: null },
      'Ignoring non-scalar connector parameter',
    );
  });
});

describe('parseConnectorConfig', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('returns the defaults for empty parameters', () => {
    const config = parseConnectorConfig({}, log);

    expect(config).toEqual(DEFAULT_CONFIG);
    expect([...config.acceptedCategories]).toEqual(['neb', 'storage']);
    expect([...config.acceptedElements]).toEqual(['metric']);
    expect(config.hardOnly).toBe(1);
    expect(config.skipAnonymousEvents).toBe(true);
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('returns a frozen configuration', () => {
    expect(Object.isFrozen(parseConnectorConfig({ hard_only: '0' }, log))).toBe(true);
  });

  it('parses every recognized option', () => {
    const config = parseConnectorConfig({
      category_type: 'neb,bam',
      element_type: 'host_status, service_status',
      host_status: '1,2',
      service_status: '2',
      hard_only: '0',
      acknowledged: '1',
      in_downtime: '1',
      skip_anon_events: '0',
      max_buffer_size: '50',
      max_buffer_age: '30',
      http_server_url: 'http://alerts.test/api/events',
      log_level: 'DEBUG',
    }, log);

    expect([...config.acceptedCategories]).toEqual(['neb', 'bam']);
    expect([...config.acceptedElements]).toEqual(['host_status', 'service_status']);
    expect([...config.hostStatuses]).toEqual([1, 2]);
    expect([...config.serviceStatuses]).toEqual([2]);
    expect(config.hardOnly).toBe(0);
    expect(config.acknowledged).toBe(1);
    expect(config.inDowntime).toBe(1);
    expect(config.skipAnonymousEvents).toBe(false);
    expect(config.maxBufferSize).toBe(50);
    expect(config.maxBufferAge).toBe(30);
    expect(config.httpServerUrl).toBe('http://alerts.test/api/events');
    expect(config.logLevel).toBe('debug');
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('logs each recognized parameter', () => {
    parseConnectorConfig({ hard_only: '0' }, log);
    expect(log.info).toHaveBeenCalledWith({ parameter: 'hard_only', value: '0' }, 'Connector parameter set');
  });

  it('logs and ignores unrecognized parameters', () => {
    const config = parseConnectorConfig({ verbosity: 'high' }, log);

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(log.info).toHaveBeenCalledWith(
      { parameter: 'verbosity', value: 'high' },
      'Ignoring unhandled connector parameter',
    );
  });

  it('drops non-numeric status codes', () => {
    const config = parseConnectorConfig({ host_status: '0, x ,2' }, log);

    expect([...config.hostStatuses]).toEqual([0, 2]);
    expect(log.warn).toHaveBeenCalledWith(
      { parameter: 'host_status', token: 'x' },
      'Ignoring non-numeric status code',
    );
  });

  it('accepts an empty status list as an empty set', () => {
    expect(parseConnectorConfig({ service_status: '' }, log).serviceStatuses.size).toBe(0);
  });

  it('drops names unknown to the taxonomy', () => {
    const config = parseConnectorConfig({ category_type: 'neb,graphite', element_type: 'metric,cpu' }, log);

    expect([...config.acceptedCategories]).toEqual(['neb']);
    expect([...config.acceptedElements]).toEqual(['metric']);
    expect(log.warn).toHaveBeenCalledWith(
      { parameter: 'category_type', name: 'graphite' },
      'Ignoring unknown taxonomy name',
    );
    expect(log.warn).toHaveBeenCalledWith(
      { parameter: 'element_type', name: 'cpu' },
      'Ignoring unknown taxonomy name',
    );
  });

  it('falls back to the default for a flag outside 0 and 1', () => {
    const config = parseConnectorConfig({ hard_only: '2', acknowledged: 'yes' }, log);

    expect(config.hardOnly).toBe(1);
    expect(config.acknowledged).toBe(0);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ parameter: 'hard_only', value: '2', fallback: 1 }),
      'Invalid connector parameter, using default',
    );
  });

  it('falls back for invalid buffer sizes, urls and log levels', () => {
    const config = parseConnectorConfig({
      max_buffer_size: '0',
      max_buffer_age: 'soon',
      http_server_url: 'not a url',
      log_level: 'loud',
    }, log);

    expect(config.maxBufferSize).toBe(1);
    expect(config.maxBufferAge).toBe(5);
    expect(config.httpServerUrl).toBeUndefined();
    expect(config.logLevel).toBe('info');
    expect(log.warn).toHaveBeenCalledTimes(4);
  });
});

describe('describeConfig', () => {
  it('renders the defaults with parameter names', () => {
    expect(describeConfig(DEFAULT_CONFIG)).toEqual({
      category_type: ['neb', 'storage'],
      element_type: ['metric'],
      host_status: [0, 1, 2],
      service_status: [0, 1, 2, 3],
      hard_only: 1,
      acknowledged: 0,
      in_downtime: 0,
      skip_anon_events: 1,
      max_buffer_size: 1,
      max_buffer_age: 5,
      http_server_url: null,
      log_level: 'info',
    });
  });
});
