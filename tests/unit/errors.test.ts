/**
 * Error taxonomy: codes, details and the subclass relationships callers
 * branch on.
 */

import { describe, it, expect } from 'vitest';
import {
  SDKError,
  RequestBuildError,
  TransportError,
  TransportTimeoutError,
  DecodingError,
  ResponseError,
  RateLimitError,
  ServiceUnavailableError,
  PaginationParseError,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  describe('SDKError', () => {
    it('should create error with message and code', () => {
      const error = new SDKError('Test error', 'TEST_CODE');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toBeUndefined();
      expect(error.name).toBe('SDKError');
    });

    it('should create error with details', () => {
      const details = { requestId: 'req-1' };
      const error = new SDKError('Test error', 'TEST_CODE', details);
      expect(error.details).toEqual(details);
    });
  });

  describe('RequestBuildError', () => {
    it('should carry its code', () => {
      const error = new RequestBuildError('Request path must not be empty');
      expect(error).toBeInstanceOf(SDKError);
      expect(error.code).toBe('REQUEST_BUILD_ERROR');
      expect(error.name).toBe('RequestBuildError');
    });
  });

  describe('TransportError', () => {
    it('should create error with details', () => {
      const error = new TransportError('Network error: ECONNRESET', { code: 'ECONNRESET' });
      expect(error.code).toBe('TRANSPORT_ERROR');
      expect(error.details).toEqual({ code: 'ECONNRESET' });
    });

    it('should specialize timeouts', () => {
      const error = new TransportTimeoutError();
      expect(error).toBeInstanceOf(TransportError);
      expect(error.message).toBe('Request timeout');
      expect(error.code).toBe('TRANSPORT_TIMEOUT');
    });
  });

  describe('DecodingError', () => {
    it('should keep the undecodable body and status', () => {
      const error = new DecodingError('Unexpected token <', '<html>', 502);
      expect(error.code).toBe('DECODING_ERROR');
      expect(error.body).toBe('<html>');
      expect(error.status).toBe(502);
      expect(error.details).toEqual({ status: 502 });
    });
  });

  describe('ResponseError', () => {
    it('should default field errors to an empty list', () => {
      const error = new ResponseError('Invalid ID.', { status: 404, errorCode: 'invalid_id' });
      expect(error.code).toBe('RESPONSE_ERROR');
      expect(error.status).toBe(404);
      expect(error.errorCode).toBe('invalid_id');
      expect(error.fieldErrors).toEqual([]);
      expect(error.details).toEqual({ status: 404, errorCode: 'invalid_id' });
    });
  });

  describe('RateLimitError', () => {
    it('should expose Retry-After seconds', () => {
      const error = new RateLimitError('Slow down', { status: 429 }, 3);
      expect(error).toBeInstanceOf(ResponseError);
      expect(error.code).toBe('RATE_LIMIT_EXCEEDED');
      expect(error.retryAfter).toBe(3);
      expect(error.details).toEqual({ status: 429, errorCode: undefined, retryAfter: 3 });
    });

    it('should default Retry-After to 0', () => {
      expect(new RateLimitError('', { status: 429 }).retryAfter).toBe(0);
    });
  });

  describe('ServiceUnavailableError', () => {
    it('should be a ResponseError', () => {
      const error = new ServiceUnavailableError('Maintenance', { status: 503 });
      expect(error).toBeInstanceOf(ResponseError);
      expect(error.code).toBe('SERVICE_UNAVAILABLE');
    });
  });

  describe('PaginationParseError', () => {
    it('should carry its code and details', () => {
      const error = new PaginationParseError('Could not extract pagination link header', {
        entry: 'garbage',
      });
      expect(error.code).toBe('PAGINATION_PARSE_ERROR');
      expect(error.details).toEqual({ entry: 'garbage' });
    });
  });
});
