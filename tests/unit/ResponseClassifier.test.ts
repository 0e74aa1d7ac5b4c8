// tests/unit/ResponseClassifier.test.ts

import { describe, it, expect } from 'vitest';
import { classifyResponse, parseRetryAfter } from '../../src/core/http/ResponseClassifier';
import type { RawResponse } from '../../src/core/http/types';
import {
  DecodingError,
  RateLimitError,
  ResponseError,
  ServiceUnavailableError,
} from '../../src/utils/errors';

function response(status: number, body: string, headers: Record<string, string> = {}): RawResponse {
  return { status, statusText: '', headers, body };
}

function failure(raw: RawResponse): DecodingError | ResponseError {
  const result = classifyResponse(raw);
  if (result.ok) {
    throw new Error(`expected a failure for status ${raw.status}`);
  }
  return result.error;
}

describe('classifyResponse', () => {
  describe('success', () => {
    it('should decode a 2xx JSON body', () => {
      expect(classifyResponse(response(200, '[{"id":1},{"id":2}]'))).toEqual({
        ok: true,
        data: [{ id: 1 }, { id: 2 }],
      });
    });

    it('should not inspect error-looking fields in a 2xx body', () => {
      const body = '{"code":"woocommerce_rest_error","message":"looks like an error"}';

      expect(classifyResponse(response(200, body))).toEqual({
        ok: true,
        data: { code: 'woocommerce_rest_error', message: 'looks like an error' },
      });
    });

    it('should decode an empty 2xx body as null', () => {
      expect(classifyResponse(response(204, ''))).toEqual({ ok: true, data: null });
    });

    it('should report a DecodingError for a malformed 2xx body', () => {
      const error = failure(response(200, 'not json'));

      expect(error).toBeInstanceOf(DecodingError);
      expect(error.status).toBe(200);
      expect(error instanceof DecodingError && error.body).toBe('not json');
    });
  });

  describe('errors', () => {
    it('should build a ResponseError from the API error body', () => {
      const error = failure(
        response(
          404,
          '{"code":"woocommerce_rest_product_invalid_id","message":"Invalid ID.","data":{"status":404}}'
        )
      );

      expect(error).toBeInstanceOf(ResponseError);
      expect(error).not.toBeInstanceOf(RateLimitError);
      expect(error.message).toBe('Invalid ID.');
      expect(error.status).toBe(404);
      expect(error instanceof ResponseError && error.errorCode).toBe(
        'woocommerce_rest_product_invalid_id'
      );
      expect(error instanceof ResponseError && error.fieldErrors).toEqual([]);
    });

    it('should collect field errors from data.params', () => {
      const error = failure(
        response(
          400,
          JSON.stringify({
            code: 'rest_invalid_param',
            message: 'Invalid parameter(s): name, sku',
            data: {
              status: 400,
              params: { name: 'name is not of type string.', sku: 'sku is already in use.' },
            },
          })
        )
      );

      expect(error.message).toBe('Invalid parameter(s): name, sku');
      expect(error instanceof ResponseError && error.fieldErrors).toEqual([
        'name: name is not of type string.',
        'sku: sku is already in use.',
      ]);
    });

    it('should keep the raw data of the error body', () => {
      const error = failure(response(400, '{"code":"x","message":"y","data":{"status":400}}'));

      expect(error instanceof ResponseError && error.data).toEqual({ status: 400 });
    });

    it('should accept an empty error body', () => {
      const error = failure(response(500, ''));

      expect(error).toBeInstanceOf(ResponseError);
      expect(error.message).toBe('');
      expect(error.status).toBe(500);
    });

    it('should accept a JSON null error body', () => {
      const error = failure(response(500, 'null'));

      expect(error).toBeInstanceOf(ResponseError);
      expect(error.message).toBe('');
    });

    it('should report a DecodingError for a non-JSON error body', () => {
      const error = failure(response(502, '<html>Bad Gateway</html>'));

      expect(error).toBeInstanceOf(DecodingError);
      expect(error.status).toBe(502);
      expect(error instanceof DecodingError && error.body).toBe('<html>Bad Gateway</html>');
    });

    it('should report a DecodingError for an error body of the wrong shape', () => {
      const error = failure(response(400, '[1,2]'));

      expect(error).toBeInstanceOf(DecodingError);
      expect(error.message).toMatch(/^Unexpected error body: /);
    });

    it('should classify 429 with its Retry-After', () => {
      const error = failure(
        response(429, '{"code":"too_many","message":"Slow down"}', { 'retry-after': '2.5' })
      );

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error.message).toBe('Slow down');
      expect(error instanceof RateLimitError && error.retryAfter).toBe(2.5);
      expect(error.details?.retryAfter).toBe(2.5);
    });

    it('should read a missing Retry-After as 0', () => {
      const error = failure(response(429, ''));

      expect(error instanceof RateLimitError && error.retryAfter).toBe(0);
    });

    it('should classify 503 as ServiceUnavailableError', () => {
      const error = failure(response(503, '{"message":"Maintenance"}'));

      expect(error).toBeInstanceOf(ServiceUnavailableError);
      expect(error).toBeInstanceOf(ResponseError);
      expect(error.message).toBe('Maintenance');
      expect(error.status).toBe(503);
    });

    it('should replace the message of a 406', () => {
      const error = failure(response(406, '{"code":"x","message":"Something unrelated"}'));

      expect(error).toBeInstanceOf(ResponseError);
      expect(error.message).toBe('Not Acceptable');
      expect(error.status).toBe(406);
    });

    it('should treat non-2xx statuses outside the error range as errors', () => {
      const error = failure(response(302, ''));

      expect(error).toBeInstanceOf(ResponseError);
      expect(error.status).toBe(302);
    });
  });
});

describe('parseRetryAfter', () => {
  it.each([
    [undefined, 0],
    ['', 0],
    ['2', 2],
    ['1.5', 1.5],
    ['-3', 0],
    ['soon', 0],
    ['Wed, 21 Oct 2015 07:28:00 GMT', 0],
  ])('should read %s as %s seconds', (value, expected) => {
    expect(parseRetryAfter(value)).toBe(expected);
  });
});
