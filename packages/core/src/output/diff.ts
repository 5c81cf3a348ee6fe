/**
 * Compare two route manifests by action name
 */

import type { RouteManifest } from './writer';

type ManifestRoute = RouteManifest['routes'][number];

export interface RouteSummary {
  name: string;
  method: string;
  path: string;
}

export interface ChangedRoute extends RouteSummary {
  oldMethod: string;
  oldPath: string;
}

export interface ManifestDiff {
  added: RouteSummary[];
  removed: RouteSummary[];
  changed: ChangedRoute[];
}

export function diffManifests(
  baseline: RouteManifest,
  current: RouteManifest,
): ManifestDiff {
  const before = new Map(baseline.routes.map((route) => [route.name, route]));
  const after = new Map(current.routes.map((route) => [route.name, route]));

  const added: RouteSummary[] = [];
  const removed: RouteSummary[] = [];
  const changed: ChangedRoute[] = [];

  for (const [name, route] of after) {
    const previous = before.get(name);
    if (!previous) {
      added.push(toSummary(route));
    } else if (previous.method !== route.method || previous.path !== route.path) {
      changed.push({
        ...toSummary(route),
        oldMethod: previous.method,
        oldPath: previous.path,
      });
    }
  }

  for (const [name, route] of before) {
    if (!after.has(name)) {
      removed.push(toSummary(route));
    }
  }

  const byName = (a: RouteSummary, b: RouteSummary) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

  return {
    added: added.sort(byName),
    removed: removed.sort(byName),
    changed: changed.sort(byName),
  };
}

function toSummary(route: ManifestRoute): RouteSummary {
  return { name: route.name, method: route.method, path: route.path };
}
