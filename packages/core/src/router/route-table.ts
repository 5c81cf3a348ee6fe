/**
 * Route table - holds resolved routes, rejects conflicts and matches requests
 */

import type {
  HttpMethod,
  RouteDefinition,
  RouteMatch,
  RouteName,
} from "@route-conventions/types";
import { DuplicateRouteError } from "../errors";
import { HTTP_METHODS, formatRouteName } from "../conventions";
import { defineAction, type DefineActionOptions } from "../helpers";

interface CompiledRoute {
  definition: RouteDefinition;
  segments: string[];
}

export class RouteTable {
  private routes: CompiledRoute[] = [];
  private byName = new Map<string, RouteDefinition>();
  private byMethodAndPath = new Map<string, RouteDefinition>();

  /**
   * Add a resolved route. Throws DuplicateRouteError when its name is taken,
   * or when a route with the same method already matches the same requests
   * (placeholder names and trailing slashes aside).
   */
  add(definition: RouteDefinition): this {
    const existingName = this.byName.get(definition.name);
    if (existingName) {
      throw new DuplicateRouteError(
        definition.name,
        describe(existingName),
        "route names must be unique",
      );
    }

    const segments = splitPath(definition.path);
    const key = routeKey(definition.method, segments);
    const existingRoute = this.byMethodAndPath.get(key);
    if (existingRoute) {
      throw new DuplicateRouteError(
        definition.name,
        describe(existingRoute),
        `both match ${definition.method} ${definition.path}`,
      );
    }

    this.routes.push({ definition, segments });
    this.byName.set(definition.name, definition);
    this.byMethodAndPath.set(key, definition);
    return this;
  }

  /**
   * Resolve an action name and add it
   */
  define(
    name: RouteName | string,
    options: DefineActionOptions = {},
  ): RouteDefinition {
    const helpers = defineAction(name, options);
    const definition: RouteDefinition = {
      name: formatRouteName(helpers.name),
      method: helpers.pattern.method,
      path: helpers.pattern.path,
      params: helpers.pattern.params,
      mode: options.mode ?? "plain",
      explicit: helpers.explicit,
    };
    this.add(definition);
    return definition;
  }

  find(name: string): RouteDefinition | undefined {
    const definition = this.byName.get(name);
    return definition ? copyDefinition(definition) : undefined;
  }

  /**
   * All routes, ordered by path then by GET, POST, PUT, DELETE
   */
  list(): RouteDefinition[] {
    return this.routes
      .map((route) => copyDefinition(route.definition))
      .sort(compareRoutes);
  }

  get size(): number {
    return this.routes.length;
  }

  /**
   * Match a request. Static segments win over placeholders at the first
   * position where candidates differ, so /users/new beats /users/:id.
   */
  match(method: string, path: string): RouteMatch | null {
    const requestMethod = method.toUpperCase();
    const requestSegments = splitPath(stripQuery(path));

    let best: { route: CompiledRoute; params: Record<string, string> } | null =
      null;

    for (const route of this.routes) {
      if (route.definition.method !== requestMethod) continue;
      const params = matchSegments(route.segments, requestSegments);
      if (!params) continue;
      if (!best || isMoreSpecific(route.segments, best.route.segments)) {
        best = { route, params };
      }
    }

    return best
      ? { route: copyDefinition(best.route.definition), params: best.params }
      : null;
  }
}

/**
 * Shape of a route: placeholders collapse to `:`, so /users/:id and
 * /users/:slug/ share a key.
 */
function routeKey(method: HttpMethod, segments: string[]): string {
  const shape = segments.map((segment) =>
    isPlaceholder(segment) ? ":" : segment,
  );
  return `${method} /${shape.join("/")}`;
}

// Stored definitions never leave the table
function copyDefinition(definition: RouteDefinition): RouteDefinition {
  return { ...definition, params: [...definition.params] };
}

function describe(definition: RouteDefinition): string {
  return definition.file
    ? `${definition.name} (${definition.file})`
    : definition.name;
}

function stripQuery(path: string): string {
  const index = path.search(/[?#]/);
  return index === -1 ? path : path.slice(0, index);
}

function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

function isPlaceholder(segment: string): boolean {
  return segment.startsWith(":");
}

function matchSegments(
  template: string[],
  request: string[],
): Record<string, string> | null {
  if (template.length !== request.length) return null;

  const params = new Map<string, string>();
  for (let i = 0; i < template.length; i++) {
    const expected = template[i];
    if (isPlaceholder(expected)) {
      let value: string;
      try {
        value = decodeURIComponent(request[i]);
      } catch {
        // Malformed percent-encoding cannot match any placeholder
        return null;
      }
      params.set(expected.slice(1), value);
    } else if (expected !== request[i]) {
      return null;
    }
  }
  // fromEntries defines own properties, so `:__proto__` is stored as a value
  return Object.fromEntries(params);
}

function isMoreSpecific(candidate: string[], current: string[]): boolean {
  for (let i = 0; i < candidate.length; i++) {
    const candidateStatic = !isPlaceholder(candidate[i]);
    const currentStatic = !isPlaceholder(current[i]);
    if (candidateStatic !== currentStatic) return candidateStatic;
  }
  return false;
}

function compareRoutes(a: RouteDefinition, b: RouteDefinition): number {
  if (a.path !== b.path) {
    return a.path < b.path ? -1 : 1;
  }
  return HTTP_METHODS.indexOf(a.method) - HTTP_METHODS.indexOf(b.method);
}
