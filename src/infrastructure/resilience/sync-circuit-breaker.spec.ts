import { CircuitBreakerError, NoopCircuitBreakerListener, STATE_CLOSED, STATE_HALF_OPEN, STATE_OPEN } from '@/domain/breaker';
import type { CircuitBreakerHandle, CircuitStateName, SyncCircuitStorage } from '@/domain/breaker';
import { MemoryCircuitStorage } from '@/infrastructure/storage';
import { createMockLogger } from '../../../test/support/mock-logger';
import { CallEventsListener, StateChangeListener } from '../../../test/support/recording-listener';
import { SyncCircuitBreaker } from './sync-circuit-breaker';

class BusinessError extends Error {}

describe('SyncCircuitBreaker', () => {
  let dateNowSpy: jest.SpyInstance;
  let currentTime: number;

  beforeEach(() => {
    currentTime = 1_000_000;
    dateNowSpy = jest.spyOn(Date, 'now').mockImplementation(() => currentTime);
  });

  afterEach(() => {
    dateNowSpy.mockRestore();
  });

  const createBreaker = (options: ConstructorParameters<typeof SyncCircuitBreaker>[0] = {}) =>
    new SyncCircuitBreaker({ failMax: 2, resetTimeoutMs: 1000, name: 'ledger', logger: createMockLogger(), ...options });

  const fail = () => {
    throw new Error('fail');
  };

  it('should return the operation result synchronously', () => {
    const breaker = createBreaker();

    expect(breaker.call((a: number, b: number) => a * b, 3, 4)).toBe(12);
  });

  it('should pass a returned promise through untouched', async () => {
    const breaker = createBreaker();
    const pending = Promise.resolve('later');

    expect(breaker.call(() => pending)).toBe(pending);
    await pending;
  });

  it('should go through the full cycle', () => {
    const transitions = new StateChangeListener();
    const breaker = createBreaker({ listeners: [transitions] });

    expect(() => breaker.call(fail)).toThrow('fail');
    expect(breaker.failCounter).toBe(1);
    expect(() => breaker.call(fail)).toThrow('Failures threshold reached, circuit breaker opened');
    expect(breaker.currentState).toBe(STATE_OPEN);

    expect(() => breaker.call(() => 'blocked')).toThrow('Timeout not elapsed yet, circuit breaker still open');

    currentTime += 1000;
    expect(breaker.call(() => 'trial')).toBe('trial');

    expect(breaker.currentState).toBe(STATE_CLOSED);
    expect(breaker.failCounter).toBe(0);
    expect(transitions.out).toBe('closed->open,open->half-open,half-open->closed,');
  });

  it('should raise a breaker error carrying the tripping failure', () => {
    const breaker = createBreaker({ failMax: 1 });

    let caught: unknown;
    try {
      breaker.call(fail);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CircuitBreakerError);
    expect(caught).toMatchObject({ breakerName: 'ledger', state: STATE_OPEN });
  });

  it('should reopen when the trial fails', () => {
    const breaker = createBreaker({ failMax: 1 });
    expect(() => breaker.call(fail)).toThrow(CircuitBreakerError);
    currentTime += 1000;

    expect(() => breaker.call(fail)).toThrow('Trial call failed, circuit breaker opened');

    expect(breaker.currentState).toBe(STATE_OPEN);
  });

  it('should ignore excluded errors', () => {
    const events = new CallEventsListener();
    const breaker = createBreaker({ failMax: 1, excluded: [BusinessError], listeners: [events] });

    expect(() =>
      breaker.call(() => {
        throw new BusinessError('declined');
      }),
    ).toThrow(BusinessError);

    expect(breaker.currentState).toBe(STATE_CLOSED);
    expect(events.out).toBe('-success');
  });

  it('should count rejected calls when enabled', () => {
    const breaker = createBreaker({ failMax: 1, countRejectedCalls: true });
    expect(() => breaker.call(fail)).toThrow(CircuitBreakerError);

    expect(() => breaker.call(() => 'blocked')).toThrow(CircuitBreakerError);

    expect(breaker.failCounter).toBe(2);
  });

  it('should support explicit transitions', () => {
    const breaker = createBreaker();

    breaker.open();
    expect(breaker.currentState).toBe(STATE_OPEN);
    breaker.halfOpen();
    expect(breaker.currentState).toBe(STATE_HALF_OPEN);
    breaker.close();
    expect(breaker.currentState).toBe(STATE_CLOSED);
  });

  describe('transitions requested by listeners', () => {
    /** Closes the breaker again as soon as it opens. */
    class ReclosingListener extends NoopCircuitBreakerListener {
      constructor(private readonly breaker: () => SyncCircuitBreaker) {
        super();
      }

      stateChange(_breaker: CircuitBreakerHandle, _oldState: CircuitStateName, newState: CircuitStateName): void {
        if (newState === STATE_OPEN) {
          this.breaker().close();
        }
      }
    }

    it('should run the requested transition after the current one completes', () => {
      const transitions = new StateChangeListener();
      const breaker: SyncCircuitBreaker = createBreaker({
        failMax: 1,
        listeners: [transitions, new ReclosingListener(() => breaker)],
      });

      expect(() => breaker.call(fail)).toThrow('Failures threshold reached, circuit breaker opened');

      expect(transitions.out).toBe('closed->open,open->closed,');
      expect(breaker.currentState).toBe(STATE_CLOSED);
      expect(breaker.failCounter).toBe(0);
    });

    it('should log a requested transition that fails', () => {
      const logger = createMockLogger();
      const storage = new MemoryCircuitStorage();
      const setState = storage.setState.bind(storage);
      jest.spyOn(storage, 'setState').mockImplementation((state: CircuitStateName) => {
        if (state === STATE_CLOSED) {
          throw new Error('storage down');
        }
        setState(state);
      });
      const breaker: SyncCircuitBreaker = createBreaker({
        failMax: 1,
        storage,
        logger,
        listeners: [new ReclosingListener(() => breaker)],
      });

      expect(() => breaker.call(fail)).toThrow(CircuitBreakerError);

      expect(breaker.currentState).toBe(STATE_OPEN);
      expect(logger.error).toHaveBeenCalledWith('Deferred breaker transition failed', {
        breaker: 'ledger',
        target: STATE_CLOSED,
        error: 'storage down',
      });
    });
  });

  it('should follow a state changed by another breaker on the same storage', () => {
    const storage = new MemoryCircuitStorage();
    const first = createBreaker({ storage });
    const second = createBreaker({ storage });
    expect(second.reconcile()).toBe(STATE_CLOSED);

    first.open();

    expect(second.reconcile()).toBe(STATE_OPEN);
    expect(() => second.call(() => 'blocked')).toThrow(CircuitBreakerError);
  });

  it('should wrap a function', () => {
    const breaker = createBreaker();
    const greet = breaker.wrap((name: string) => `hello ${name}`);

    expect(greet('ops')).toBe('hello ops');
  });

  it('should refuse storage that answers asynchronously', () => {
    const asyncStorage = {
      name: 'async',
      getState: () => Promise.resolve(STATE_CLOSED),
    } as unknown as SyncCircuitStorage;
    const breaker = createBreaker({ storage: asyncStorage });

    expect(() => breaker.call(() => 'never')).toThrow(
      'Storage answered asynchronously; use CircuitBreaker instead of SyncCircuitBreaker',
    );
  });
});
