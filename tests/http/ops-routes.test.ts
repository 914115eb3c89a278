import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fastify } from 'fastify';
import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { EngineStore } from '../../src/application/index.js';
import { buildEngine, enginePlugin, InMemoryNameCache } from '../../src/infrastructure/index.js';
import { opsRoutes } from '../../src/interfaces/http/index.js';
import { fakeLogger, hostStatusPayload } from '../rules/helpers.js';

/** In-process stand-ins for the Redis and Postgres clients. */
function fakeRedis() {
  return {
    xadd: vi.fn().mockResolvedValue('1767268245000-0'),
    publish: vi.fn().mockResolvedValue(1),
    ping: vi.fn().mockResolvedValue('PONG'),
  };
}

function fakeDb() {
  return {
    execute: vi.fn().mockResolvedValue([]),
  };
}

describe('ops routes', () => {
  let app: FastifyInstance;
  let redis: ReturnType<typeof fakeRedis>;
  let db: ReturnType<typeof fakeDb>;

  beforeEach(async () => {
    redis = fakeRedis();
    db = fakeDb();
    const log = fakeLogger();
    const names = new InMemoryNameCache();
    const build = () => buildEngine({ category_type: 'neb', element_type: 'host_status' }, names, log);

    app = fastify();
    await app.register(fp(async (instance) => {
      instance.decorate('redis', redis as unknown as import('ioredis').Redis);
    }, { name: 'redis' }));
    await app.register(fp(async (instance) => {
      instance.decorate('db', db as unknown as import('../../src/infrastructure/db/index.js').Database);
    }, { name: 'db' }));
    await app.register(enginePlugin, { engines: new EngineStore(build()), reload: build });
    await app.register(opsRoutes);
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  // ── POST /api/v1/connector/events ─────────────────────────

  it('enqueues events that pass the pre-filter', async () => {
    const payload = hostStatusPayload();
    const res = await app.inject({ method: 'POST', url: '/api/v1/connector/events', payload });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ status: 'queued', entry_id: '1767268245000-0' });
    expect(redis.xadd).toHaveBeenCalledOnce();

    const args: unknown[] = redis.xadd.mock.calls[0] ?? [];
    expect(args.slice(0, 6)).toEqual(['broker_events', '*', 'category', '1', 'element', '14']);
    expect(args[6]).toBe('payload');
    expect(JSON.parse(String(args[7]))).toEqual(payload);
  });

  it('does not enqueue events the pre-filter drops', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/connector/events',
      payload: { category: 1, element: 24, service_id: 3 },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'filtered' });
    expect(redis.xadd).not.toHaveBeenCalled();
  });

  it('rejects events without integer ids', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/connector/events', payload: { category: 'neb' } });

    expect(res.statusCode).toBe(400);
    expect(redis.xadd).not.toHaveBeenCalled();
  });

  // ── POST /api/v1/connector/names/reload ───────────────────

  it('publishes a names change with the given reason', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/connector/names/reload',
      payload: { reason: 'host renamed' },
    });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ status: 'reload_requested' });
    expect(redis.publish).toHaveBeenCalledWith('names_changed', expect.stringContaining('"reason":"host renamed"'));
  });

  it('defaults the reason when no body is sent', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/connector/names/reload' });

    expect(res.statusCode).toBe(202);
    expect(redis.publish).toHaveBeenCalledWith('names_changed', expect.stringContaining('"reason":"manual"'));
  });

  it('answers 503 when the notification cannot be published', async () => {
    redis.publish.mockRejectedValue(new Error('READONLY'));

    const res = await app.inject({ method: 'POST', url: '/api/v1/connector/names/reload' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'unavailable' });
  });

  // ── GET /api/v1/connector/health ──────────────────────────

  it('reports ok when Redis and Postgres answer', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/connector/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', redis: 'ok', database: 'ok' });
    expect(db.execute).toHaveBeenCalledOnce();
  });

  it('reports degraded when Redis is unreachable', async () => {
    redis.ping.mockRejectedValue(new Error('ECONNREFUSED'));

    const res = await app.inject({ method: 'GET', url: '/api/v1/connector/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'degraded', redis: 'unreachable', database: 'ok' });
  });

  it('reports degraded when Postgres is unreachable', async () => {
    db.execute.mockRejectedValue(new Error('ECONNREFUSED'));

    const res = await app.inject({ method: 'GET', url: '/api/v1/connector/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'degraded', redis: 'ok', database: 'unreachable' });
  });
});
