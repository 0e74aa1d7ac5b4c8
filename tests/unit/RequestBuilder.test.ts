// tests/unit/RequestBuilder.test.ts

import { describe, it, expect } from 'vitest';
import { RequestBuilder, USER_AGENT } from '../../src/core/http/RequestBuilder';
import { RequestBuildError } from '../../src/utils/errors';

describe('RequestBuilder', () => {
  const builder = new RequestBuilder('https://shop.test', '/wp-json/wc/v3');

  it('should prefix the path and stamp default headers', () => {
    const request = builder.build({ method: 'GET', path: 'products' }, 'req-1');

    expect(request.url.toString()).toBe('https://shop.test/wp-json/wc/v3/products');
    expect(request.headers).toEqual({
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      'X-Request-ID': 'req-1',
    });
    expect(request.body).toBeUndefined();
  });

  it('should strip leading slashes from the relative path', () => {
    const request = builder.build({ method: 'GET', path: '//products/12' }, 'req-1');

    expect(request.url.pathname).toBe('/wp-json/wc/v3/products/12');
  });

  it('should keep a sub-path on the base URL', () => {
    const nested = new RequestBuilder('https://shop.test/store/', '/wp-json/wc/v3/');
    const request = nested.build({ method: 'GET', path: 'customers' }, 'req-1');

    expect(request.url.toString()).toBe('https://shop.test/store/wp-json/wc/v3/customers');
  });

  it('should append path query values after option values', () => {
    const request = builder.build(
      { method: 'GET', path: 'products?status=publish&page=9', query: { page: 2, per_page: 10 } },
      'req-1'
    );

    expect(request.url.search).toBe('?page=2&per_page=10&status=publish&page=9');
    expect(request.url.searchParams.getAll('page')).toEqual(['2', '9']);
  });

  it('should keep the path query when no options are given', () => {
    const request = builder.build({ method: 'GET', path: 'products?status=draft' }, 'req-1');

    expect(request.url.toString()).toBe('https://shop.test/wp-json/wc/v3/products?status=draft');
  });

  it('should serialize the body as JSON with a content type', () => {
    const request = builder.build(
      { method: 'POST', path: 'products', body: { name: 'Mug', regular_price: '9.99' } },
      'req-1'
    );

    expect(request.body).toBe('{"name":"Mug","regular_price":"9.99"}');
    expect(request.headers['Content-Type']).toBe('application/json');
    expect(request.headers.Accept).toBe('application/json');
  });

  it('should reject an empty path', () => {
    expect(() => builder.build({ method: 'GET', path: '' }, 'req-1')).toThrow(RequestBuildError);
    expect(() => builder.build({ method: 'GET', path: '   ' }, 'req-1')).toThrow(
      'Request path must not be empty'
    );
  });

  it('should reject unencodable options at build time', () => {
    expect(() =>
      builder.build({ method: 'GET', path: 'products', query: { filter: { a: 1 } } }, 'req-1')
    ).toThrow(RequestBuildError);
  });

  it('should reject a circular body', () => {
    const body: Record<string, unknown> = {};
    body.self = body;

    expect(() => builder.build({ method: 'POST', path: 'products', body }, 'req-1')).toThrow(
      'Request body could not be serialized'
    );
  });

  it('should reject an invalid base URL', () => {
    expect(() => new RequestBuilder('not a url', '/wp-json/wc/v3')).toThrow('Invalid shop base URL');
  });
});
