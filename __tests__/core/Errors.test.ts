import { describe, it, expect } from 'vitest';
import {
  NatsBoxError,
  ConnectionError,
  RequestError,
  PublishError,
  UsageError,
  errorMessage,
  asError,
} from '../../src/core/errors';

describe('Errors', () => {
  describe('NatsBoxError', () => {
    it('should create error with message, code, and details', () => {
      const error = new NatsBoxError('Test error', 'TEST_CODE', { foo: 'bar' });

      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toEqual({ foo: 'bar' });
      expect(error.name).toBe('NatsBoxError');
    });

    it('should have stack trace', () => {
      const error = new NatsBoxError('Test error', 'TEST_CODE');
      expect(error.stack).toBeDefined();
    });
  });

  describe('ConnectionError', () => {
    it('should create failed, closed and auth variants', () => {
      const failed = ConnectionError.failed('connection refused', { servers: ['nats://a:4222'] });
      const closed = ConnectionError.closed('connection closed');
      const auth = ConnectionError.auth('Authorization Violation');

      expect(failed.code).toBe('CONNECTION_ERROR:FAILED');
      expect(failed.details).toEqual({ servers: ['nats://a:4222'] });
      expect(closed.code).toBe('CONNECTION_ERROR:CLOSED');
      expect(auth.code).toBe('CONNECTION_ERROR:AUTH');
      expect(auth.name).toBe('ConnectionError');
      expect(auth).toBeInstanceOf(NatsBoxError);
    });
  });

  describe('RequestError', () => {
    it('should word messages the way the tool reports them', () => {
      expect(RequestError.timeout().message).toBe('timeout for request');
      expect(RequestError.noResponders().message).toBe('no responders for request');
      expect(RequestError.failed('permissions violation').message).toBe(
        'permissions violation for request'
      );
    });

    it('should carry distinct codes', () => {
      expect(RequestError.timeout({ subject: 'time' }).code).toBe('REQUEST_ERROR:TIMEOUT');
      expect(RequestError.noResponders().code).toBe('REQUEST_ERROR:NO_RESPONDERS');
      expect(RequestError.failed('x').code).toBe('REQUEST_ERROR:FAILED');
    });
  });

  describe('PublishError', () => {
    it('should create flush failure', () => {
      const error = PublishError.flushFailed('connection draining');

      expect(error.message).toBe('connection draining');
      expect(error.code).toBe('PUBLISH_ERROR:FLUSH_FAILED');
    });
  });

  describe('UsageError', () => {
    it('should describe flag problems', () => {
      expect(UsageError.unknownFlag('x').message).toBe('flag provided but not defined: -x');
      expect(UsageError.missingValue('s').message).toBe('flag needs an argument: -s');
      expect(UsageError.invalidValue('t', 'maybe').message).toBe(
        'invalid boolean value "maybe" for -t'
      );
      expect(UsageError.badSyntax('---s').message).toBe('bad flag syntax: ---s');
    });

    it('should keep the offending flag in details', () => {
      expect(UsageError.unknownFlag('x').details).toEqual({ flag: 'x' });
      expect(UsageError.unknownFlag('x').code).toBe('USAGE_ERROR:UNKNOWN_FLAG');
    });
  });

  describe('helpers', () => {
    it('should extract messages from anything thrown', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
    });

    it('should wrap non-errors', () => {
      const original = new Error('boom');

      expect(asError(original)).toBe(original);
      expect(asError(42).message).toBe('42');
    });
  });
});
