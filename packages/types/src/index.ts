/**
 * Shared types for route-conventions
 */

/**
 * Terminal tag of every action name. Fixes the HTTP method and whether the
 * path carries an `:id` placeholder.
 */
export type ActionKind =
  | "Index"
  | "Show"
  | "New"
  | "Create"
  | "Edit"
  | "Update"
  | "Delete";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * - plain: `/<namespace…>/<resource>`
 * - nested: the segment before the resource is a parent, `/<parent>/:<parent>_id/<resource>`
 */
export type ResolveMode = "plain" | "nested";

/**
 * Namespace-qualified action name, e.g. `Api::V1::Users::Show`
 * is `{ segments: ["Api", "V1", "Users"], action: "Show" }`.
 */
export interface RouteName {
  readonly segments: readonly string[];
  readonly action: ActionKind;
}

export interface RoutePattern {
  method: HttpMethod;
  /** Path template with `:name` placeholders */
  path: string;
  /** Placeholder names, in order of appearance */
  params: string[];
}

/** A pattern with every placeholder filled in. */
export interface RouteTarget {
  method: HttpMethod;
  path: string;
}

export type RedirectStatus = 301 | 302 | 303 | 307 | 308;

export interface Redirect {
  status: RedirectStatus;
  location: string;
}

export type ParamValue = string | number;

export type QueryValue = string | number | boolean;

export type QueryParams = Record<
  string,
  QueryValue | readonly QueryValue[] | undefined
>;

/**
 * A route name bound to its pattern and to where it was declared.
 */
export interface RouteDefinition {
  name: string;
  method: HttpMethod;
  path: string;
  params: string[];
  mode: ResolveMode;
  /** True when the action declared its own path instead of using the convention */
  explicit: boolean;
  /** File the action was discovered in (absent for routes defined in code) */
  file?: string;
  /** Exported class name of the action, when one was found */
  className?: string;
}

export interface RouteMatch {
  route: RouteDefinition;
  params: Record<string, string>;
}

export interface ScanConfig {
  rootDir: string;
  /** Directory holding action files, relative to rootDir */
  actionsDir: string;
  include?: string[];
  exclude?: string[];
  /** Used when printing absolute URLs */
  baseUrl?: string;
}

export interface ScanResult {
  routes: RouteDefinition[];
  filesScanned: number;
  errors: ScanError[];
}

export interface ScanError {
  file: string;
  message: string;
  code?: string;
}
