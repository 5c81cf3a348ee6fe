/**
 * Route statistics for manifests and terminal output
 */

import type { RouteDefinition } from '@route-conventions/types';

export interface RouteStatistics {
  totalRoutes: number;
  byMethod: Record<string, number>;
  nested: number;
  explicit: number;
}

/**
 * Count routes by method and by how they were declared
 */
export function summarizeRoutes(routes: RouteDefinition[]): RouteStatistics {
  const byMethod: Record<string, number> = {};
  let nested = 0;
  let explicit = 0;

  for (const route of routes) {
    byMethod[route.method] = (byMethod[route.method] || 0) + 1;
    if (route.mode === 'nested') nested++;
    if (route.explicit) explicit++;
  }

  return {
    totalRoutes: routes.length,
    byMethod,
    nested,
    explicit,
  };
}
