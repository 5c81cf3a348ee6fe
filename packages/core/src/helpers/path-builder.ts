/**
 * Path template utilities - placeholder extraction and URL building
 */

import type {
  ParamValue,
  QueryParams,
  QueryValue,
} from "@route-conventions/types";
import { MissingRouteParamError } from "../errors";

const PLACEHOLDER = /:([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Placeholder names of a literal template, at compile time.
 * e.g. ParamNames<"/projects/:project_id/users/:id"> = "project_id" | "id"
 */
export type ParamNames<T extends string> =
  T extends `${string}:${infer Param}/${infer Rest}`
    ? Param | ParamNames<`/${Rest}`>
    : T extends `${string}:${infer Param}`
      ? Param
      : never;

export type PathParams<T extends string> = Record<ParamNames<T>, ParamValue>;

/**
 * Placeholder names in order of appearance
 */
export function paramNames(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);
}

/**
 * Fill a template's placeholders and append a query string.
 */
export function buildPath<T extends string>(
  template: T,
  params: PathParams<T>,
  query?: QueryParams,
): string;
export function buildPath(
  template: string,
  params: Record<string, ParamValue>,
  query?: QueryParams,
): string;
export function buildPath(
  template: string,
  params: Record<string, ParamValue>,
  query?: QueryParams,
): string {
  const path = template.replace(PLACEHOLDER, (_placeholder, name: string) => {
    const value = Object.hasOwn(params, name) ? params[name] : undefined;
    if (value === undefined) {
      throw new MissingRouteParamError(name, template);
    }
    return encodeURIComponent(String(value));
  });

  return path + buildQueryString(query);
}

/**
 * Serialize query params, `?` included. Empty when nothing is left to send.
 */
export function buildQueryString(query?: QueryParams): string {
  if (!query) return "";

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    const values = isValueList(value) ? value : [value];
    for (const v of values) {
      searchParams.append(key, String(v));
    }
  }

  const serialized = searchParams.toString();
  return serialized ? `?${serialized}` : "";
}

function isValueList(
  value: QueryValue | readonly QueryValue[],
): value is readonly QueryValue[] {
  return Array.isArray(value);
}

/**
 * Join a base URL and a path, tolerating a trailing slash on the base.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return baseUrl.replace(/\/+$/, "") + path;
}
