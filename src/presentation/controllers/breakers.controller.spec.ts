/**
 * E2E - Breakers and health API
 *
 * Boots the controllers on the Fastify adapter and sends requests with
 * `inject`, so no port is opened. Breaker state lives in an in-process
 * Redis stand-in.
 */

import { ConsoleLogger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import { BreakerRegistry, HealthService } from '@/application/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { REDIS_CLIENT } from '@/infrastructure/redis';
import { HttpExceptionFilter } from '@/presentation/filters';
import { FakeRedis } from '../../../test/support/fake-redis';
import { createMockLogger } from '../../../test/support/mock-logger';
import { BreakersController } from './breakers.controller';
import { HealthController } from './health.controller';

describe('Breakers API (E2E)', () => {
  let app: NestFastifyApplication;
  let redis: FakeRedis;

  const config: Record<string, string | number> = {
    SERVICE_NAME: 'gateway',
    BREAKER_ENV: 'test',
    BREAKER_FAIL_MAX: 2,
    BREAKER_RESET_TIMEOUT_MS: 15000,
    BREAKER_STORAGE: 'redis',
    DEPENDENCY_URLS: 'billing=http://billing.test',
  };

  beforeEach(async () => {
    // The exception filter logs through ConsoleLogger
    jest.spyOn(ConsoleLogger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(ConsoleLogger.prototype, 'error').mockImplementation(() => undefined);

    redis = new FakeRedis();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [BreakersController, HealthController],
      providers: [
        BreakerRegistry,
        HealthService,
        {
          provide: ConfigService,
          useValue: { get: (key: string, defaultValue?: unknown) => config[key] ?? defaultValue },
        },
        { provide: REDIS_CLIENT, useValue: redis.asRedis() },
        { provide: LOGGER_SERVICE, useValue: createMockLogger() },
      ],
    }).compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(new FastifyAdapter(), { logger: false });
    app.useGlobalFilters(new HttpExceptionFilter());
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  describe('GET /breakers', () => {
    it('should list the service breaker registered at startup', async () => {
      const response = await app.inject({ method: 'GET', url: '/breakers' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual([
        {
          name: 'gateway',
          namespace: 'test:gateway',
          state: 'half-open',
          failCounter: 0,
          failMax: 2,
          resetTimeoutMs: 15000,
        },
      ]);
    });
  });

  describe('GET /breakers/:name', () => {
    it('should create and describe a configured dependency', async () => {
      const response = await app.inject({ method: 'GET', url: '/breakers/billing' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ name: 'billing', namespace: 'test:billing', state: 'closed' });
      expect(redis.data.get('breaker:test:billing:state')).toBe('closed');
    });

    it('should return 404 for an unknown dependency', async () => {
      const response = await app.inject({ method: 'GET', url: '/breakers/ghost' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        statusCode: 404,
        message: 'No breaker for dependency "ghost"',
        error: 'Not Found',
        path: '/breakers/ghost',
      });
    });
  });

  describe('POST /breakers/:name/:transition', () => {
    it('should open, half-open and close a breaker', async () => {
      const opened = await app.inject({ method: 'POST', url: '/breakers/billing/open' });
      expect(opened.statusCode).toBe(200);
      expect(opened.json()).toMatchObject({ state: 'open' });
      expect(redis.data.get('breaker:test:billing:opened_at')).toEqual(expect.stringMatching(/^\d+$/));

      const probing = await app.inject({ method: 'POST', url: '/breakers/billing/half-open' });
      expect(probing.json()).toMatchObject({ state: 'half-open' });

      const closed = await app.inject({ method: 'POST', url: '/breakers/billing/close' });
      expect(closed.json()).toMatchObject({ state: 'closed', failCounter: 0 });
    });

    it('should return 404 for an unknown dependency', async () => {
      const response = await app.inject({ method: 'POST', url: '/breakers/ghost/open' });

      expect(response.statusCode).toBe(404);
      expect(redis.keys()).not.toContain('breaker:test:ghost:state');
    });
  });

  describe('GET /health', () => {
    it('should be healthy with every breaker closed or probing', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'healthy', storage: { status: 'healthy' }, openBreakers: [] });
    });

    it('should be degraded while a breaker is open', async () => {
      await app.inject({ method: 'POST', url: '/breakers/billing/open' });

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'degraded', openBreakers: ['billing'] });
    });

    it('should answer 503 when Redis is unreachable', async () => {
      redis.failure = new Error('Connection refused');

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
    });
  });
});
