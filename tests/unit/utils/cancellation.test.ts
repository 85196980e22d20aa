import {
  createCancellationSource,
  createCanceledError,
  isCanceledError,
  raceWithCancellation,
} from '../../../src/shared/utils/cancellation';

describe('shared/utils/cancellation', () => {
  describe('createCancellationSource', () => {
    it('starts non-canceled and becomes canceled with an optional reason', () => {
      const source = createCancellationSource();

      expect(source.token.isCanceled).toBe(false);
      expect(source.token.reason).toBeUndefined();

      const reason = { kind: 'user_abort' };
      source.cancel(reason);

      expect(source.token.isCanceled).toBe(true);
      expect(source.token.reason).toBe(reason);
    });

    it('cancel is idempotent and preserves the first reason', () => {
      const source = createCancellationSource();
      const first = new Error('first');

      source.cancel(first);
      source.cancel(new Error('second'));

      expect(source.token.reason).toBe(first);
    });

    it('throwIfCanceled is a no-op before cancel and throws an enriched error after', () => {
      const source = createCancellationSource();
      expect(() => source.token.throwIfCanceled()).not.toThrow();

      const reason = { kind: 'user_abort' };
      source.cancel(reason);

      let thrown: unknown;
      try {
        source.token.throwIfCanceled('capture');
      } catch (err) {
        thrown = err;
      }

      expect(isCanceledError(thrown)).toBe(true);
      if (isCanceledError(thrown)) {
        expect(thrown.message).toBe('Operation canceled (capture)');
        expect(thrown.cancellationReason).toBe(reason);
      }
    });

    it('notifies listeners once and supports unsubscribe', () => {
      const source = createCancellationSource();
      const kept = jest.fn();
      const dropped = jest.fn();

      source.token.onCanceled(kept);
      const unsubscribe = source.token.onCanceled(dropped);
      unsubscribe();

      source.cancel('stop');
      source.cancel('again');

      expect(kept).toHaveBeenCalledTimes(1);
      expect(kept).toHaveBeenCalledWith('stop');
      expect(dropped).not.toHaveBeenCalled();
    });

    it('fires a listener immediately when the token is already canceled', () => {
      const source = createCancellationSource();
      source.cancel('early');

      const listener = jest.fn();
      source.token.onCanceled(listener);

      expect(listener).toHaveBeenCalledWith('early');
    });
  });

  describe('createCanceledError', () => {
    it('uses a plain message without context', () => {
      const error = createCanceledError('why');
      expect(error.message).toBe('Operation canceled');
      expect(error.cancellationReason).toBe('why');
    });

    it('is not confused with ordinary errors', () => {
      expect(isCanceledError(new Error('boom'))).toBe(false);
      expect(isCanceledError('canceled')).toBe(false);
    });
  });

  describe('raceWithCancellation', () => {
    it('returns the promise unchanged without a token', async () => {
      await expect(raceWithCancellation(Promise.resolve(7), undefined)).resolves.toBe(7);
    });

    it('resolves with the value when the token is never canceled', async () => {
      const source = createCancellationSource();
      await expect(raceWithCancellation(Promise.resolve('e4'), source.token)).resolves.toBe('e4');
    });

    it('propagates the rejection of the raced promise', async () => {
      const source = createCancellationSource();
      const failure = new Error('service down');
      await expect(raceWithCancellation(Promise.reject(failure), source.token)).rejects.toBe(failure);
    });

    it('rejects as soon as the token is canceled and reports the late result', async () => {
      const source = createCancellationSource();
      let finish: (value: string) => void = () => undefined;
      const slow = new Promise<string>((resolve) => {
        finish = resolve;
      });
      const onDiscarded = jest.fn();

      const raced = raceWithCancellation(slow, source.token, onDiscarded);
      source.cancel({ kind: 'user_abort' });

      await expect(raced).rejects.toMatchObject({
        message: 'Operation canceled',
        cancellationReason: { kind: 'user_abort' },
      });

      finish('Nf3');
      await new Promise((resolve) => setImmediate(resolve));

      expect(onDiscarded).toHaveBeenCalledWith({ value: 'Nf3' });
    });

    it('rejects immediately for an already canceled token', async () => {
      const source = createCancellationSource();
      source.cancel('before');

      await expect(
        raceWithCancellation(new Promise<never>(() => undefined), source.token)
      ).rejects.toMatchObject({ cancellationReason: 'before' });
    });
  });
});
