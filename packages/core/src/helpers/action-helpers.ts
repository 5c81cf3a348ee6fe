/**
 * Path and route accessors generated for an action name
 */

import type {
  HttpMethod,
  ParamValue,
  QueryParams,
  ResolveMode,
  RouteName,
  RoutePattern,
  RouteTarget,
} from "@route-conventions/types";
import { InvalidRouteNameError, UnexpectedRouteParamError } from "../errors";
import { formatRouteName, resolveRoute, toRouteName } from "../conventions";
import { buildPath, joinUrl, paramNames } from "./path-builder";

export interface DefineActionOptions {
  mode?: ResolveMode;
  /** Declared path; replaces the conventional one */
  path?: string;
  /** Method for a declared path (defaults to the action kind's method) */
  method?: HttpMethod;
}

export interface ActionHelpers {
  readonly name: RouteName;
  readonly pattern: RoutePattern;
  readonly params: readonly string[];
  readonly explicit: boolean;
  /** Path with placeholders filled from ordered values */
  path(...values: ParamValue[]): string;
  /** Method plus filled path */
  route(...values: ParamValue[]): RouteTarget;
  /** Absolute URL under baseUrl */
  url(baseUrl: string, ...values: ParamValue[]): string;
  /** Path from named params, with an optional query string */
  with(params: Record<string, ParamValue>, query?: QueryParams): string;
}

/**
 * Resolve the pattern for an action, honoring a declared path.
 */
export function patternFor(
  name: RouteName,
  options: DefineActionOptions = {},
): RoutePattern {
  const conventional = resolveRoute(name, options.mode ?? "plain");
  if (options.path === undefined) {
    return conventional;
  }
  if (!options.path.startsWith("/")) {
    throw new InvalidRouteNameError(
      formatRouteName(name),
      `declared path "${options.path}" must start with "/"`,
    );
  }
  return {
    method: options.method ?? conventional.method,
    path: options.path,
    params: paramNames(options.path),
  };
}

export function defineAction(
  name: RouteName | string,
  options: DefineActionOptions = {},
): ActionHelpers {
  const parsed = toRouteName(name);
  const pattern = patternFor(parsed, options);

  const namedParams = (values: ParamValue[]): Record<string, ParamValue> => {
    if (values.length > pattern.params.length) {
      throw new UnexpectedRouteParamError(
        pattern.params.length,
        values.length,
        pattern.path,
      );
    }
    const params: Record<string, ParamValue> = {};
    pattern.params.forEach((param, index) => {
      const value = values[index];
      if (value !== undefined) params[param] = value;
    });
    return params;
  };

  const path = (...values: ParamValue[]): string =>
    buildPath(pattern.path, namedParams(values));

  return Object.freeze({
    name: parsed,
    pattern,
    params: pattern.params,
    explicit: options.path !== undefined,
    path,
    route: (...values: ParamValue[]): RouteTarget => ({
      method: pattern.method,
      path: path(...values),
    }),
    url: (baseUrl: string, ...values: ParamValue[]): string =>
      joinUrl(baseUrl, path(...values)),
    with: (params: Record<string, ParamValue>, query?: QueryParams): string =>
      buildPath(pattern.path, params, query),
  });
}
