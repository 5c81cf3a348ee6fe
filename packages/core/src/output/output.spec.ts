import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { RouteDefinition, ScanResult } from '@route-conventions/types';
import { createManifest, readManifest, writeManifest, type RouteManifest } from './writer';
import { diffManifests } from './diff';
import { formatRouteTable } from './summary';
import { summarizeRoutes } from './normalize';

function route(overrides: Partial<RouteDefinition> & Pick<RouteDefinition, 'name' | 'path'>): RouteDefinition {
  return {
    method: 'GET',
    params: [],
    mode: 'plain',
    explicit: false,
    ...overrides,
  };
}

const scanResult: ScanResult = {
  routes: [
    route({ name: 'Users::Index', path: '/users', file: '/repo/src/actions/users/index.ts' }),
    route({
      name: 'Projects::Users::Update',
      method: 'PUT',
      path: '/projects/:project_id/users/:id',
      params: ['project_id', 'id'],
      mode: 'nested',
    }),
  ],
  filesScanned: 3,
  errors: [{ file: '/repo/src/actions/users/archive.ts', message: 'bad action', code: 'UnrecognizedActionKind' }],
};

describe('summarizeRoutes', () => {
  it('should count routes by method and declaration', () => {
    expect(summarizeRoutes(scanResult.routes)).toEqual({
      totalRoutes: 2,
      byMethod: { GET: 1, PUT: 1 },
      nested: 1,
      explicit: 0,
    });
  });
});

describe('createManifest', () => {
  it('should store files relative to the root', () => {
    const manifest = createManifest(scanResult, '/repo');
    expect(manifest.routes[0].file).toBe('src/actions/users/index.ts');
    expect(manifest.routes[1].file).toBeUndefined();
    expect(manifest.errors?.[0].file).toBe('src/actions/users/archive.ts');
    expect(manifest.summary).toEqual({
      totalRoutes: 2,
      byMethod: { GET: 1, PUT: 1 },
      nested: 1,
      explicit: 0,
      filesScanned: 3,
      errors: 1,
    });
  });

  it('should leave errors out when there are none', () => {
    const manifest = createManifest({ ...scanResult, errors: [] });
    expect(manifest.errors).toBeUndefined();
  });
});

describe('writeManifest / readManifest', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'route-conventions-output-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read back what was written', async () => {
    const outputPath = path.join(dir, 'out', 'routes.json');
    await writeManifest(scanResult, { outputPath, rootDir: '/repo' });
    const manifest = await readManifest(outputPath);
    expect(manifest).toEqual(createManifest(scanResult, '/repo'));
  });

  it('should reject files that are not manifests', async () => {
    const badPath = path.join(dir, 'bad.json');
    fs.writeFileSync(badPath, JSON.stringify({ routes: 'none' }));
    await expect(readManifest(badPath)).rejects.toThrow(`Invalid route manifest ${badPath}:`);
  });
});

describe('diffManifests', () => {
  const base: RouteManifest = createManifest({ routes: [
    route({ name: 'Users::Index', path: '/users' }),
    route({ name: 'Users::Show', path: '/users/:id', params: ['id'] }),
    route({ name: 'Users::Delete', method: 'DELETE', path: '/users/:id', params: ['id'] }),
  ], filesScanned: 3, errors: [] });

  it('should report added, removed and changed routes', () => {
    const current = createManifest({ routes: [
      route({ name: 'Users::Index', path: '/users' }),
      route({ name: 'Users::Show', path: '/people/:id', params: ['id'] }),
      route({ name: 'Users::New', path: '/users/new' }),
    ], filesScanned: 3, errors: [] });

    expect(diffManifests(base, current)).toEqual({
      added: [{ name: 'Users::New', method: 'GET', path: '/users/new' }],
      removed: [{ name: 'Users::Delete', method: 'DELETE', path: '/users/:id' }],
      changed: [{
        name: 'Users::Show',
        method: 'GET',
        path: '/people/:id',
        oldMethod: 'GET',
        oldPath: '/users/:id',
      }],
    });
  });

  it('should report nothing for identical manifests', () => {
    expect(diffManifests(base, base)).toEqual({ added: [], removed: [], changed: [] });
  });
});

describe('formatRouteTable', () => {
  it('should align methods and paths', () => {
    const lines = formatRouteTable(scanResult).split('\n');
    expect(lines).toContain('  GET     /users                           Users::Index');
    expect(lines).toContain('  PUT     /projects/:project_id/users/:id  Projects::Users::Update  (nested)');
    expect(lines).toContain('  Total routes:   2');
    expect(lines).toContain('  archive.ts - bad action');
  });

  it('should say when there are no routes', () => {
    const lines = formatRouteTable({ routes: [], filesScanned: 0, errors: [] }).split('\n');
    expect(lines).toContain('  No routes found');
  });
});
