import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DEFAULT_CONFIG, parseConnectorConfig } from '../../src/application/index.js';
import type { NormalizedAlert } from '../../src/domain/index.js';
import {
  createAlertDispatcher,
  createLogSink,
  createSinks,
  createWebhookSink,
} from '../../src/infrastructure/delivery/index.js';
import type { AlertSink } from '../../src/infrastructure/delivery/index.js';
import { fakeLogger } from '../rules/helpers.js';

const sampleAlert: NormalizedAlert = {
  source: 'centreon',
  event_class: 'centreon',
  node: 'web01',
  resource: 'HTTP',
  severity: 1,
  description: 'CRITICAL - connection refused',
  time_of_event: '2026-01-01 11:50:45',
};

const ENDPOINT = 'http://alerts.test/api/events';

describe('createWebhookSink', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('POSTs the alert as JSON', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    vi.stubGlobal('fetch', mockFetch);

    const result = await createWebhookSink(ENDPOINT, log).deliver(sampleAlert);

    expect(result).toEqual({ sink: 'webhook', delivered: true, status: 200 });
    expect(mockFetch).toHaveBeenCalledWith(ENDPOINT, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(sampleAlert),
    });
    expect(log.info).toHaveBeenCalledWith(
      { node: 'web01', resource: 'HTTP', severity: 1 },
      'Alert delivered',
    );
  });

  it('reports non-OK statuses', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 502 }));

    const result = await createWebhookSink(ENDPOINT, log).deliver(sampleAlert);

    expect(result).toEqual({ sink: 'webhook', delivered: false, status: 502 });
    expect(log.warn).toHaveBeenCalledWith(
      { status: 502, node: 'web01', resource: 'HTTP' },
      'Alerting endpoint returned non-OK status',
    );
  });

  it('reports network errors without throwing', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('Network error')));

    const result = await createWebhookSink(ENDPOINT, log).deliver(sampleAlert);

    expect(result).toEqual({ sink: 'webhook', delivered: false, error: 'Network error' });
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Failed to deliver alert',
    );
  });
});

describe('createLogSink', () => {
  it('logs every alert', async () => {
    const log = fakeLogger();

    const result = await createLogSink(log).deliver(sampleAlert);

    expect(result).toEqual({ sink: 'log', delivered: true });
    expect(log.info).toHaveBeenCalledWith({ alert: sampleAlert }, 'Alert ready for delivery');
  });
});

describe('createSinks', () => {
  it('uses only the log sink without an endpoint', () => {
    expect(createSinks(DEFAULT_CONFIG, fakeLogger()).map((s) => s.name)).toEqual(['log']);
  });

  it('adds the webhook sink when an endpoint is configured', () => {
    const log = fakeLogger();
    const config = parseConnectorConfig({ http_server_url: ENDPOINT }, log);
    expect(createSinks(config, log).map((s) => s.name)).toEqual(['log', 'webhook']);
  });
});

describe('createAlertDispatcher', () => {
  function fakeSink(name: string, deliver: AlertSink['deliver']): AlertSink {
    return { name, deliver };
  }

  it('hands the alert to every sink', () => {
    const first = vi.fn<AlertSink['deliver']>().mockResolvedValue({ sink: 'a', delivered: true });
    const second = vi.fn<AlertSink['deliver']>().mockResolvedValue({ sink: 'b', delivered: true });

    createAlertDispatcher([fakeSink('a', first), fakeSink('b', second)], fakeLogger())(sampleAlert);

    expect(first).toHaveBeenCalledWith(sampleAlert);
    expect(second).toHaveBeenCalledWith(sampleAlert);
  });

  it('keeps going when one sink fails', async () => {
    const log = fakeLogger();
    const failing = vi.fn<AlertSink['deliver']>().mockRejectedValue(new Error('boom'));
    const healthy = vi.fn<AlertSink['deliver']>().mockResolvedValue({ sink: 'b', delivered: true });

    createAlertDispatcher([fakeSink('a', failing), fakeSink('b', healthy)], log)(sampleAlert);

    expect(healthy).toHaveBeenCalledOnce();
    await vi.waitFor(() => {
      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ sink: 'a', err: expect.any(Error) }),
        'Alert sink failed',
      );
    });
  });
});
