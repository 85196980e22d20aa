/**
 * Tests for the structured logging implementation.
 */
import { logger, maskSensitiveData } from '../../src/server/utils/logger';

describe('Logger Utilities', () => {
  describe('maskSensitiveData', () => {
    it('should keep the first four characters of long secrets', () => {
      const masked = maskSensitiveData({ password: 'secret123', username: 'john' });
      expect(masked).toEqual({ password: 'secr...[REDACTED]', username: 'john' });
    });

    it('should fully mask short secrets and non-string values', () => {
      expect(maskSensitiveData({ apiKey: 'short', secretCount: 5 })).toEqual({
        apiKey: '[REDACTED]',
        secretCount: '[REDACTED]',
      });
    });

    it('should keep null and undefined under sensitive keys', () => {
      expect(maskSensitiveData({ token: null, authorization: undefined })).toEqual({
        token: null,
        authorization: undefined,
      });
    });

    it('should mask nested objects and arrays', () => {
      const masked = maskSensitiveData({
        commentary: { model: 'test-model', apiKey: 'test-secret-key' },
        calls: [{ access_token: 'abcdefghij' }],
      });

      expect(masked).toEqual({
        commentary: { model: 'test-model', apiKey: 'test...[REDACTED]' },
        calls: [{ access_token: 'abcd...[REDACTED]' }],
      });
    });

    it('should serialize errors', () => {
      const error = new Error('boom');
      expect(maskSensitiveData({ error })).toEqual({
        error: { name: 'Error', message: 'boom', stack: error.stack },
      });
    });

    it('should stop at the maximum depth', () => {
      const data = { outer: { password: 'x' } };
      expect(maskSensitiveData(data, 1)).toEqual({ outer: { password: 'x' } });
    });

    it('should pass primitives through', () => {
      expect(maskSensitiveData('plain')).toBe('plain');
      expect(maskSensitiveData(42)).toBe(42);
    });
  });

  describe('logger', () => {
    it('should tag entries with the service name', () => {
      expect(logger.defaultMeta).toEqual({ service: 'voice-chess' });
    });

    it('should use the level configured for tests', () => {
      expect(logger.level).toBe('error');
    });
  });
});
