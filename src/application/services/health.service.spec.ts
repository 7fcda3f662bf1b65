import type { BreakerStatusDto } from '@/application/dtos';
import { STATE_CLOSED, STATE_OPEN } from '@/domain/breaker';
import { FakeRedis } from '../../../test/support/fake-redis';
import { BreakerRegistry } from './breaker-registry.service';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let mockRegistry: { list: jest.Mock<Promise<BreakerStatusDto[]>, []> };

  const status = (name: string, state: BreakerStatusDto['state']): BreakerStatusDto => ({
    name,
    namespace: `test:${name}`,
    state,
    failCounter: 0,
    failMax: 5,
    resetTimeoutMs: 15000,
  });

  beforeEach(() => {
    mockRegistry = {
      list: jest.fn().mockResolvedValue([status('billing', STATE_CLOSED)]),
    };
  });

  const createService = (redis: FakeRedis | null) =>
    new HealthService(mockRegistry as unknown as BreakerRegistry, redis ? redis.asRedis() : null);

  describe('check', () => {
    it('should be healthy with memory storage and closed breakers', async () => {
      const result = await createService(null).check();

      expect(result.status).toBe('healthy');
      expect(result.storage).toBeUndefined();
      expect(result.openBreakers).toEqual([]);
    });

    it('should include timestamp in ISO format', async () => {
      const result = await createService(null).check();

      expect(result.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should be degraded while a breaker is open', async () => {
      mockRegistry.list.mockResolvedValue([status('billing', STATE_OPEN), status('users', STATE_CLOSED)]);

      const result = await createService(null).check();

      expect(result.status).toBe('degraded');
      expect(result.openBreakers).toEqual(['billing']);
    });

    it('should report a reachable Redis', async () => {
      const result = await createService(new FakeRedis()).check();

      expect(result.status).toBe('healthy');
      expect(result.storage?.status).toBe('healthy');
      expect(result.storage?.latencyMs).toEqual(expect.any(Number));
    });

    it('should be unhealthy when Redis fails', async () => {
      const redis = new FakeRedis();
      redis.failure = new Error('Connection refused');

      const result = await createService(redis).check();

      expect(result.status).toBe('unhealthy');
      expect(result.storage).toEqual(
        expect.objectContaining({ status: 'unhealthy', message: 'Connection refused' }),
      );
    });

    it('should prefer unhealthy over degraded', async () => {
      const redis = new FakeRedis();
      redis.failure = new Error('Connection refused');
      mockRegistry.list.mockResolvedValue([status('billing', STATE_OPEN)]);

      const result = await createService(redis).check();

      expect(result.status).toBe('unhealthy');
    });

    describe('with a hanging Redis', () => {
      beforeEach(() => {
        jest.useFakeTimers();
      });

      afterEach(() => {
        jest.useRealTimers();
      });

      it('should give up after the component timeout', async () => {
        const redis = new FakeRedis();
        jest.spyOn(redis, 'ping').mockReturnValue(new Promise<'PONG'>(() => undefined));

        const pending = createService(redis).check();
        await jest.advanceTimersByTimeAsync(3000);
        const result = await pending;

        expect(result.status).toBe('unhealthy');
        expect(result.storage?.message).toBe('Timeout');
      });
    });
  });
});
