import { CircuitBreaker, CircuitOpenError } from '../../../src/server/services/CircuitBreaker';

jest.mock('../../../src/server/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('CircuitBreaker', () => {
  const fail = () => Promise.reject(new Error('down'));

  it('opens after the threshold and recovers after the cooldown', async () => {
    let now = 1_000;
    const breaker = new CircuitBreaker({ threshold: 2, cooldownMs: 500, now: () => now, name: 'test' });

    await expect(breaker.execute(fail)).rejects.toThrow('down');
    expect(breaker.getStatus()).toEqual({ isOpen: false, failureCount: 1 });
    await expect(breaker.execute(fail)).rejects.toThrow('down');
    expect(breaker.getStatus()).toEqual({ isOpen: true, failureCount: 2 });

    const skipped = jest.fn(async () => 'ok');
    await expect(breaker.execute(skipped)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(skipped).not.toHaveBeenCalled();

    now += 501;
    await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
    expect(breaker.getStatus()).toEqual({ isOpen: false, failureCount: 0 });
  });

  it('resets the failure count after a success', async () => {
    const breaker = new CircuitBreaker({ threshold: 2 });

    await expect(breaker.execute(fail)).rejects.toThrow('down');
    await breaker.execute(async () => 1);
    await expect(breaker.execute(fail)).rejects.toThrow('down');

    expect(breaker.getStatus()).toEqual({ isOpen: false, failureCount: 1 });
  });

  it('names the service in the open error', () => {
    expect(new CircuitOpenError('commentary').message).toBe(
      'Circuit breaker is open - commentary temporarily unavailable'
    );
  });
});
