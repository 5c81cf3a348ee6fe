import { describe, it, expect } from 'vitest';
import { buildPath, buildQueryString, joinUrl, paramNames } from './path-builder';
import { MissingRouteParamError } from '../errors';

describe('paramNames', () => {
  it('should list placeholders in order', () => {
    expect(paramNames('/projects/:project_id/users/:id/edit')).toEqual(['project_id', 'id']);
    expect(paramNames('/users')).toEqual([]);
  });
});

describe('buildPath', () => {
  it('should fill placeholders', () => {
    expect(buildPath('/projects/:project_id/users/:id', { project_id: 7, id: 'abc' })).toBe(
      '/projects/7/users/abc',
    );
  });

  it('should encode values', () => {
    expect(buildPath('/tags/:id', { id: 'a b/c' })).toBe('/tags/a%20b%2Fc');
  });

  it('should not confuse placeholders sharing a prefix', () => {
    expect(buildPath('/users/:id/items/:id_type', { id: 1, id_type: 'x' })).toBe(
      '/users/1/items/x',
    );
  });

  it('should append query params', () => {
    expect(buildPath('/users', {}, { page: 2, tag: ['a', 'b'], draft: false, q: undefined })).toBe(
      '/users?page=2&tag=a&tag=b&draft=false',
    );
  });

  it('should fail when a value is missing', () => {
    expect(() => buildPath('/users/:id', {})).toThrow(MissingRouteParamError);
    expect(() => buildPath('/users/:id', {})).toThrow(
      'Missing value for path parameter "id" in /users/:id',
    );
  });

  it('should not read values inherited from Object.prototype', () => {
    expect(() => buildPath('/users/:constructor', {})).toThrow(
      'Missing value for path parameter "constructor" in /users/:constructor',
    );
    expect(buildPath('/users/:toString', { toString: 'me' })).toBe('/users/me');
  });
});

describe('buildQueryString', () => {
  it('should be empty without entries', () => {
    expect(buildQueryString()).toBe('');
    expect(buildQueryString({ q: undefined })).toBe('');
  });

  it('should encode keys and values', () => {
    expect(buildQueryString({ 'sort by': 'name asc' })).toBe('?sort+by=name+asc');
  });
});

describe('joinUrl', () => {
  it('should tolerate a trailing slash on the base', () => {
    expect(joinUrl('https://example.test/', '/users/1')).toBe('https://example.test/users/1');
    expect(joinUrl('https://example.test', '/users/1')).toBe('https://example.test/users/1');
  });
});
