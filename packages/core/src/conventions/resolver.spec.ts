import { describe, it, expect } from 'vitest';
import { resolveRoute } from './resolver';
import { routeName } from './route-name';
import { InvalidRouteNameError, UnrecognizedActionKindError } from '../errors';

describe('resolveRoute', () => {
  describe('plain mode', () => {
    it('should map every action kind to its method and path', () => {
      expect(resolveRoute('Users::Index')).toEqual({ method: 'GET', path: '/users', params: [] });
      expect(resolveRoute('Users::Show')).toEqual({ method: 'GET', path: '/users/:id', params: ['id'] });
      expect(resolveRoute('Users::New')).toEqual({ method: 'GET', path: '/users/new', params: [] });
      expect(resolveRoute('Users::Create')).toEqual({ method: 'POST', path: '/users', params: [] });
      expect(resolveRoute('Users::Edit')).toEqual({ method: 'GET', path: '/users/:id/edit', params: ['id'] });
      expect(resolveRoute('Users::Update')).toEqual({ method: 'PUT', path: '/users/:id', params: ['id'] });
      expect(resolveRoute('Users::Delete')).toEqual({ method: 'DELETE', path: '/users/:id', params: ['id'] });
    });

    it('should prepend a two-segment namespace', () => {
      const pattern = resolveRoute('Api::V1::Users::Show');
      expect(pattern.method).toBe('GET');
      expect(pattern.path).toBe('/api/v1/users/:id');
    });

    it('should separate words of multi-word segments', () => {
      const pattern = resolveRoute('MyAdminSection::Users::Show', 'plain');
      expect(pattern.path).toBe('/my_admin_section/users/:id');
    });

    it('should prepend three or more namespace segments in order', () => {
      expect(resolveRoute('Admin::Api::V2::Reports::Monthly::Index').path).toBe(
        '/admin/api/v2/reports/monthly',
      );
    });

    it('should accept a parsed route name', () => {
      const name = routeName(['Api', 'Users'], 'Edit');
      expect(resolveRoute(name).path).toBe('/api/users/:id/edit');
    });
  });

  describe('nested mode', () => {
    it('should insert the parent id before the resource', () => {
      expect(resolveRoute('Projects::Users::Index', 'nested')).toEqual({
        method: 'GET',
        path: '/projects/:project_id/users',
        params: ['project_id'],
      });
    });

    it('should keep the member id after the resource', () => {
      expect(resolveRoute('Projects::Users::Update', 'nested')).toEqual({
        method: 'PUT',
        path: '/projects/:project_id/users/:id',
        params: ['project_id', 'id'],
      });
    });

    it('should keep namespace segments ahead of the parent', () => {
      expect(resolveRoute('Api::V1::Categories::Posts::Edit', 'nested').path).toBe(
        '/api/v1/categories/:category_id/posts/:id/edit',
      );
    });

    it('should singularize only the last word of a multi-word parent', () => {
      expect(resolveRoute('AdminProjects::Tasks::New', 'nested').path).toBe(
        '/admin_projects/:admin_project_id/tasks/new',
      );
    });

    it('should reject a name without a parent segment', () => {
      expect(() => resolveRoute('Users::Index', 'nested')).toThrow(InvalidRouteNameError);
    });
  });

  it('should return equal patterns for repeated resolutions', () => {
    const first = resolveRoute('Projects::Users::Delete', 'nested');
    const second = resolveRoute('Projects::Users::Delete', 'nested');
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it('should fail with UnrecognizedActionKind for an unknown terminal tag', () => {
    expect(() => resolveRoute('Users::Search')).toThrow(UnrecognizedActionKindError);
    try {
      resolveRoute('Users::Search');
    } catch (error) {
      expect(error).toBeInstanceOf(UnrecognizedActionKindError);
      if (error instanceof UnrecognizedActionKindError) {
        expect(error.code).toBe('UnrecognizedActionKind');
        expect(error.actionKind).toBe('Search');
        expect(error.name).toBe('UnrecognizedActionKindError');
      }
    }
  });
});
