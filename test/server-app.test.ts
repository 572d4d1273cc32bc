/**
 * Server App Unit Tests
 * Tests for createApp() configuration and error handling
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createApp } from '../src/server/app.js';
import { stopServer } from '../src/server/index.js';
import { MemoryDocumentStore } from '../src/store/index.js';
import { createServices } from '../src/services.js';
import { createMemoryServices, TEST_LIMITS } from './helpers/fixtures.js';

describe('Server App', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app) {
      await app.close();
      app = undefined;
    }
  });

  describe('createApp()', () => {
    it('should return configured Fastify instance', async () => {
      app = await createApp({
        port: 3000,
        host: '127.0.0.1',
        enableLogging: false,
        services: createMemoryServices(),
      });

      expect(app.server).toBeDefined();
      expect(typeof app.inject).toBe('function');
    });

    it('should reject an invalid server configuration', async () => {
      await expect(
        createApp({ port: 70000, enableLogging: false, services: createMemoryServices() })
      ).rejects.toThrow();
    });
  });

  describe('CORS configuration', () => {
    it('should answer preflight requests', async () => {
      app = await createApp({
        corsOrigins: ['http://localhost:3000'],
        enableLogging: false,
        services: createMemoryServices(),
      });

      const response = await app.inject({
        method: 'OPTIONS',
        url: '/health',
        headers: {
          'Origin': 'http://localhost:3000',
          'Access-Control-Request-Method': 'PUT',
        },
      });

      expect(response.statusCode).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('http://localhost:3000');
      expect(response.headers['access-control-allow-methods']).toContain('PUT');
    });
  });

  describe('Error handler', () => {
    it('should wrap malformed JSON bodies as BAD_REQUEST', async () => {
      app = await createApp({ enableLogging: false, services: createMemoryServices() });

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/planning/plan',
        headers: { 'Content-Type': 'application/json' },
        payload: '{"question":',
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.success).toBe(false);
      expect(body.error.code).toBe('BAD_REQUEST');
      expect(typeof body.requestId).toBe('string');
    });

    it('should hide internal errors behind INTERNAL_ERROR', async () => {
      const store = new MemoryDocumentStore();
      store.load = async () => Promise.reject(new Error('disk unavailable'));
      app = await createApp({ enableLogging: false, services: createServices(store, TEST_LIMITS) });

      const response = await app.inject({ method: 'GET', url: '/api/v1/planning/rules' });

      expect(response.statusCode).toBe(500);
      expect(response.json().error).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      });
    });

    it('should include error details for domain errors', async () => {
      app = await createApp({ enableLogging: false, services: createMemoryServices() });

      const response = await app.inject({ method: 'GET', url: '/api/v1/planning/executions/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.details).toEqual({ resource: 'Execution', id: 'nope' });
    });
  });

  describe('Request ID handling', () => {
    it('should generate unique request IDs', async () => {
      app = await createApp({ enableLogging: false, services: createMemoryServices() });

      const response1 = await app.inject({ method: 'GET', url: '/health' });
      const response2 = await app.inject({ method: 'GET', url: '/health' });

      expect(typeof response1.headers['x-request-id']).toBe('string');
      expect(response1.headers['x-request-id']).not.toBe(response2.headers['x-request-id']);
    });
  });

  describe('stopServer()', () => {
    it('should close the instance and run its close hooks', async () => {
      const closed = await createApp({ enableLogging: false, services: createMemoryServices() });
      const onClose = vi.fn(async () => undefined);
      closed.addHook('onClose', onClose);

      await stopServer(closed);

      expect(onClose).toHaveBeenCalledTimes(1);
    });
  });
});
