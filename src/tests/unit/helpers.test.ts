import { parseTrendingDays } from '../../controllers/feed.controller';
import { bearerToken } from '../../middleware/auth.middleware';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { MAX_PAGE, mapPage, parsePageRequest, toLimitOffset } from '../../utils/pagination';
import { parseBody, parseId, queryBoolean, queryNotificationType, queryString } from '../../validation/parse';
import { commentSchema } from '../../validation/schemas';

describe('pagination', () => {
  it('defaults to the first page of 20', () => {
    expect(parsePageRequest({})).toEqual({ page: 1, pageSize: 20 });
  });

  it('ignores malformed values and caps the page size', () => {
    expect(parsePageRequest({ page: '0', pageSize: 'ten' })).toEqual({ page: 1, pageSize: 20 });
    expect(parsePageRequest({ page: '3', pageSize: '500' })).toEqual({ page: 3, pageSize: 100 });
  });

  it('caps huge pages so the offset stays a safe integer', () => {
    const request = parsePageRequest({ page: '99999999999999999999', pageSize: '100' });
    expect(request).toEqual({ page: MAX_PAGE, pageSize: 100 });
    expect(Number.isSafeInteger(toLimitOffset(request).offset)).toBe(true);
  });

  it('converts a page to limit and offset', () => {
    expect(toLimitOffset({ page: 3, pageSize: 10 })).toEqual({ limit: 10, offset: 20 });
  });

  it('maps results and keeps the counters', () => {
    const page = { count: 2, page: 1, pageSize: 20, results: [1, 2] };
    expect(mapPage(page, n => n * 10)).toEqual({ count: 2, page: 1, pageSize: 20, results: [10, 20] });
  });
});

describe('request parsing', () => {
  it('accepts positive integer ids only', () => {
    expect(parseId('15', 'Post')).toBe(15);
    expect(() => parseId('0', 'Post')).toThrow(NotFoundError);
    expect(() => parseId('abc', 'Post')).toThrow('Post not found');
    expect(() => parseId(undefined, 'User')).toThrow('User not found');
  });

  it('reads query strings, booleans and notification types', () => {
    expect(queryString('  tech ')).toBe('tech');
    expect(queryString('   ')).toBeUndefined();
    expect(queryString(['a'])).toBeUndefined();
    expect(queryBoolean('TRUE')).toBe(true);
    expect(queryBoolean('0')).toBe(false);
    expect(queryBoolean('maybe')).toBeUndefined();
    expect(queryNotificationType('mention')).toBe('mention');
    expect(queryNotificationType('poke')).toBeUndefined();
  });

  it('collects field errors from a body', () => {
    let caught: unknown;
    try {
      parseBody(commentSchema, {});
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    const errors = caught instanceof ValidationError ? caught.errors : {};
    expect(Object.keys(errors)).toEqual(['content']);
  });

  it('extracts bearer tokens', () => {
    expect(bearerToken('Bearer abc.def')).toBe('abc.def');
    expect(bearerToken('Bearer   ')).toBeUndefined();
    expect(bearerToken('Basic abc')).toBeUndefined();
    expect(bearerToken(undefined)).toBeUndefined();
  });
});

describe('parseTrendingDays', () => {
  it('defaults to a week', () => {
    expect(parseTrendingDays(undefined)).toBe(7);
  });

  it('reads positive integers', () => {
    expect(parseTrendingDays('30')).toBe(30);
  });

  it.each(['0', '-2', 'abc', '1.5'])('rejects %s', value => {
    expect(() => parseTrendingDays(value)).toThrow(ValidationError);
  });
});
