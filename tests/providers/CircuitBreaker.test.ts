/**
 * CircuitBreaker Tests
 */

import { CircuitBreaker, CircuitState } from '../../src/services/providers/utils/CircuitBreaker.js';
import { ProviderUnavailableError } from '../../src/errors/index.js';

jest.mock('../../src/middleware/logging.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const ONE_MINUTE = 60_000;

describe('CircuitBreaker', () => {
  let circuitBreaker: CircuitBreaker;
  let openCalled: boolean;
  let closeCalled: boolean;

  async function failOnce(): Promise<void> {
    await expect(
      circuitBreaker.execute(async () => {
        throw new Error('test failure');
      })
    ).rejects.toThrow('test failure');
  }

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    openCalled = false;
    closeCalled = false;

    circuitBreaker = new CircuitBreaker({
      name: 'test-breaker',
      threshold: 3,
      resetTimeoutMs: ONE_MINUTE,
      onOpen: () => { openCalled = true; },
      onClose: () => { closeCalled = true; },
    });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should start in closed state', () => {
    expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
    expect(circuitBreaker.isOpen()).toBe(false);
  });

  it('should allow successful requests', async () => {
    const result = await circuitBreaker.execute(async () => 'success');
    expect(result).toBe('success');
    expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('should stay closed below the threshold', async () => {
    await failOnce();
    await failOnce();

    expect(circuitBreaker.isOpen()).toBe(false);
    expect(circuitBreaker.getStats().failureCount).toBe(2);
  });

  it('should open circuit after threshold failures', async () => {
    await failOnce();
    await failOnce();
    await failOnce();

    expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);
    expect(circuitBreaker.isOpen()).toBe(true);
    expect(openCalled).toBe(true);
  });

  it('should reject requests without calling through when circuit is open', async () => {
    await failOnce();
    await failOnce();
    await failOnce();

    const fn = jest.fn(async () => 'should not run');
    await expect(circuitBreaker.execute(fn)).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(circuitBreaker.execute(fn)).rejects.toThrow('Circuit breaker is open for test-breaker');
    expect(fn).not.toHaveBeenCalled();
  });

  it('should forgive one failure per success', () => {
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();
    circuitBreaker.recordSuccess();

    expect(circuitBreaker.getStats().failureCount).toBe(1);
  });

  it('should never let the failure count drop below zero', () => {
    circuitBreaker.recordSuccess();
    circuitBreaker.recordSuccess();

    expect(circuitBreaker.getStats().failureCount).toBe(0);
  });

  it('should reset once the timeout has elapsed since the last failure', () => {
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();
    expect(circuitBreaker.isOpen()).toBe(true);

    jest.advanceTimersByTime(30_000);
    expect(circuitBreaker.isOpen()).toBe(true);

    jest.advanceTimersByTime(31_000);
    expect(circuitBreaker.isOpen()).toBe(false);
    expect(circuitBreaker.getStats().failureCount).toBe(0);
    expect(closeCalled).toBe(true);
  });

  it('should still be open exactly at the reset timeout', () => {
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();

    jest.advanceTimersByTime(ONE_MINUTE);
    expect(circuitBreaker.isOpen()).toBe(true);

    jest.advanceTimersByTime(1);
    expect(circuitBreaker.isOpen()).toBe(false);
  });

  it('should measure the timeout from the most recent failure', () => {
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();

    jest.advanceTimersByTime(45_000);
    circuitBreaker.recordFailure();

    jest.advanceTimersByTime(45_000);
    expect(circuitBreaker.isOpen()).toBe(true);

    jest.advanceTimersByTime(16_000);
    expect(circuitBreaker.isOpen()).toBe(false);
  });

  it('should reopen circuit if recovery fails', async () => {
    await failOnce();
    await failOnce();
    await failOnce();

    jest.advanceTimersByTime(ONE_MINUTE + 1);
    const result = await circuitBreaker.execute(async () => 'recovered');
    expect(result).toBe('recovered');

    await failOnce();
    await failOnce();
    expect(circuitBreaker.isOpen()).toBe(false);

    await failOnce();
    expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);
  });

  it('should close when successes bring the count back under the threshold', () => {
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();
    expect(openCalled).toBe(true);

    circuitBreaker.recordSuccess();

    expect(circuitBreaker.isOpen()).toBe(false);
    expect(closeCalled).toBe(true);
  });

  it('should clear failures on manual reset', () => {
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();
    circuitBreaker.recordFailure();

    circuitBreaker.reset();

    expect(circuitBreaker.isOpen()).toBe(false);
    expect(circuitBreaker.getStats().failureCount).toBe(0);
  });

  it('should provide statistics', () => {
    circuitBreaker.recordFailure();
    const stats = circuitBreaker.getStats();

    expect(stats).toEqual({
      state: CircuitState.CLOSED,
      failureCount: 1,
      threshold: 3,
      resetTimeoutMs: ONE_MINUTE,
      lastFailureTime: '2024-01-01T00:00:00.000Z',
    });
  });

  it('should stay closed with a zero threshold until a failure is recorded', async () => {
    const eager = new CircuitBreaker({ name: 'eager', threshold: 0, resetTimeoutMs: ONE_MINUTE });

    expect(eager.isOpen()).toBe(false);
    await expect(eager.execute(async () => 'ok')).resolves.toBe('ok');

    eager.recordFailure();
    expect(eager.isOpen()).toBe(true);

    jest.advanceTimersByTime(ONE_MINUTE + 1);
    expect(eager.isOpen()).toBe(false);
    expect(eager.getStats().failureCount).toBe(0);
  });
});
