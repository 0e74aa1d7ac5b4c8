// tests/unit/QueryEncoder.test.ts

import { describe, it, expect } from 'vitest';
import { encodeQuery } from '../../src/core/http/QueryEncoder';
import { RequestBuildError } from '../../src/utils/errors';

describe('encodeQuery', () => {
  it('should omit zero values and encode the rest', () => {
    const params = encodeQuery({
      page: 2,
      per_page: 0,
      search: '',
      featured: false,
      on_sale: true,
      include: [1, 2],
      exclude: [],
      after: new Date('2024-01-02T03:04:05Z'),
      status: undefined,
      category: null,
    });

    expect(params.toString()).toBe(
      'page=2&on_sale=true&include=1%2C2&after=2024-01-02T03%3A04%3A05.000Z'
    );
  });

  it('should keep keys in declaration order', () => {
    const params = encodeQuery({ order: 'asc', orderby: 'date', search: 'mug' });

    expect(Array.from(params.keys())).toEqual(['order', 'orderby', 'search']);
  });

  it('should return empty params for an empty object', () => {
    expect(encodeQuery({}).toString()).toBe('');
  });

  it('should omit invalid dates', () => {
    expect(encodeQuery({ before: new Date('not a date') }).toString()).toBe('');
  });

  it('should join string lists with commas', () => {
    expect(encodeQuery({ slug: ['a', 'b'] }).get('slug')).toBe('a,b');
  });

  it('should reject nested objects', () => {
    expect(() => encodeQuery({ filter: { a: 1 } })).toThrow(RequestBuildError);
  });

  it('should reject non-finite numbers', () => {
    expect(() => encodeQuery({ page: Number.NaN })).toThrow(/not a finite number/);
  });

  it('should reject functions', () => {
    expect(() => encodeQuery({ page: () => 1 })).toThrow(RequestBuildError);
  });

  it('should reject list items that are not strings or numbers', () => {
    expect(() => encodeQuery({ include: [1, {}] })).toThrow('Query option "include[1]" cannot be encoded');
  });
});
