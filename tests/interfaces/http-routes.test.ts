import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { Coordinator } from '../../src/application/coordinator.js';
import { DefaultValueEvaluator } from '../../src/application/default-evaluator.js';
import { buildServer } from '../../src/interfaces/http/index.js';
import { FakeTransport, fakeLogger, specBody } from '../helpers.js';

describe('HTTP sidecar routes', () => {
  let transport: FakeTransport;
  let client: Coordinator;
  let fastify: FastifyInstance;
  let closed: boolean;

  beforeEach(async () => {
    transport = new FakeTransport();
    transport.specResponses.push(specBody({
      feature_gates: [{ name: 'new_checkout', defaultValue: true }],
      dynamic_configs: [{ name: 'theme', defaultValue: { color: 'blue' } }],
      time: 7,
    }));
    client = new Coordinator({
      apiKey: 'test-key',
      transport,
      evaluator: new DefaultValueEvaluator(),
      log: fakeLogger(),
      nowFn: () => 1,
    });
    await client.initialize();
    fastify = await buildServer(client, { logger: false });
    closed = false;
  });

  afterEach(async () => {
    if (!closed) await fastify.close();
  });

  describe('POST /api/v1/gates/check', () => {
    it('returns the gate value', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/gates/check',
        payload: { user: { userID: 'u1' }, gate: 'new_checkout' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ gate: 'new_checkout', value: true });
      expect(client.status().pendingEvents).toBe(1);
    });

    it('rejects a body without a gate name', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/gates/check',
        payload: { user: { userID: 'u1' } },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Validation failed');
      expect(client.status().pendingEvents).toBe(0);
    });

    it('rejects a user with a non-string userID', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/gates/check',
        payload: { user: { userID: 42 }, gate: 'new_checkout' },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('POST /api/v1/configs/get', () => {
    it('returns the config value and rule id', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/configs/get',
        payload: { user: { userID: 'u1' }, config: 'theme' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ config: 'theme', value: { color: 'blue' }, ruleID: 'default' });
    });
  });

  describe('POST /api/v1/events', () => {
    it('accepts a custom event', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/events',
        payload: { user: { userID: 'u1' }, eventName: 'purchase', value: 12, metadata: { sku: 'A-1' } },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ status: 'accepted' });
      expect(client.status().pendingEvents).toBe(1);
    });

    it('rejects an empty event name', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/v1/events',
        payload: { user: {}, eventName: '' },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('POST /api/v1/flush', () => {
    it('delivers pending events and reports the backlog', async () => {
      await client.logEvent({ userID: 'u1' }, 'visit');

      const response = await fastify.inject({ method: 'POST', url: '/api/v1/flush' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ remaining: 0 });
      expect(transport.deliveredNames()).toEqual([['visit']]);
    });

    it('reports events that could not be delivered', async () => {
      transport.rgstrResponses.push(null);
      await client.logEvent({ userID: 'u1' }, 'visit');

      const response = await fastify.inject({ method: 'POST', url: '/api/v1/flush' });

      expect(response.json()).toEqual({ remaining: 1 });
    });
  });

  describe('GET /api/v1/health', () => {
    it('reports the coordinator status', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/v1/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'ok',
        phase: 'running',
        lastSyncTime: 7,
        pendingEvents: 0,
        specCount: 2,
      });
    });

    it('answers 503 once the client has stopped', async () => {
      await client.shutdown();

      const response = await fastify.inject({ method: 'GET', url: '/api/v1/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: 'unavailable', phase: 'stopped' });
    });
  });

  it('maps operations on a stopped client to 503', async () => {
    await client.shutdown();

    const response = await fastify.inject({
      method: 'POST',
      url: '/api/v1/gates/check',
      payload: { user: { userID: 'u1' }, gate: 'new_checkout' },
    });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ error: 'Cannot check gate while coordinator is stopped' });
  });

  it('shuts the client down when the server closes', async () => {
    await client.logEvent({ userID: 'u1' }, 'bye');

    await fastify.close();
    closed = true;

    expect(client.status().phase).toBe('stopped');
    expect(transport.deliveredNames()).toEqual([['bye']]);
  });
});
