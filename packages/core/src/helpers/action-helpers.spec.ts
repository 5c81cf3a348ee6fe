import { describe, it, expect } from 'vitest';
import { defineAction } from './action-helpers';
import { redirectTo } from './redirect';
import {
  InvalidRedirectStatusError,
  InvalidRouteNameError,
  MissingRouteParamError,
  UnexpectedRouteParamError,
} from '../errors';

describe('defineAction', () => {
  it('should expose the resolved pattern', () => {
    const show = defineAction('Users::Show');
    expect(show.pattern).toEqual({ method: 'GET', path: '/users/:id', params: ['id'] });
    expect(show.params).toEqual(['id']);
    expect(show.explicit).toBe(false);
  });

  it('should build paths from ordered values', () => {
    const update = defineAction('Projects::Users::Update', { mode: 'nested' });
    expect(update.path(3, 42)).toBe('/projects/3/users/42');
  });

  it('should build a route with method and path', () => {
    const remove = defineAction('Api::V1::Users::Delete');
    expect(remove.route(9)).toEqual({ method: 'DELETE', path: '/api/v1/users/9' });
  });

  it('should build paths for actions without parameters', () => {
    const index = defineAction('Users::Index');
    expect(index.path()).toBe('/users');
    expect(index.route()).toEqual({ method: 'GET', path: '/users' });
  });

  it('should build absolute URLs', () => {
    const edit = defineAction('Users::Edit');
    expect(edit.url('https://example.test/', 5)).toBe('https://example.test/users/5/edit');
  });

  it('should build paths from named params and a query', () => {
    const index = defineAction('Projects::Users::Index', { mode: 'nested' });
    expect(index.with({ project_id: 'p1' }, { page: 3 })).toBe('/projects/p1/users?page=3');
  });

  it('should reject too few values', () => {
    const show = defineAction('Users::Show');
    expect(() => show.path()).toThrow(MissingRouteParamError);
  });

  it('should reject too many values', () => {
    const show = defineAction('Users::Show');
    expect(() => show.path(1, 2)).toThrow(UnexpectedRouteParamError);
    expect(() => show.path(1, 2)).toThrow('/users/:id takes 1 path parameter(s), received 2');
  });

  it('should use a declared path and keep the action method', () => {
    const show = defineAction('Users::Show', { path: '/people/:slug' });
    expect(show.pattern).toEqual({ method: 'GET', path: '/people/:slug', params: ['slug'] });
    expect(show.explicit).toBe(true);
    expect(show.path('ada')).toBe('/people/ada');
  });

  it('should report a missing value for placeholders named like Object members', () => {
    const show = defineAction('Users::Show', { path: '/users/:constructor' });
    expect(() => show.path()).toThrow(MissingRouteParamError);
  });

  it('should use a declared method', () => {
    const update = defineAction('Users::Update', { path: '/users/:id/profile', method: 'POST' });
    expect(update.route(1)).toEqual({ method: 'POST', path: '/users/1/profile' });
  });

  it('should reject a declared path without a leading slash', () => {
    expect(() => defineAction('Users::Show', { path: 'users/:id' })).toThrow(InvalidRouteNameError);
  });
});

describe('redirectTo', () => {
  it('should default to 302', () => {
    expect(redirectTo('/users')).toEqual({ status: 302, location: '/users' });
  });

  it('should redirect to a route target', () => {
    const show = defineAction('Users::Show');
    expect(redirectTo(show.route(4), 303)).toEqual({ status: 303, location: '/users/4' });
  });

  it('should reject statuses that are not redirects', () => {
    expect(() => redirectTo('/users', 200)).toThrow(InvalidRedirectStatusError);
  });
});
