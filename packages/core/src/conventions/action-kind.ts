/**
 * The seven action kinds and the route shape each one fixes
 */

import type { ActionKind, HttpMethod } from "@route-conventions/types";

export interface ActionRouteRule {
  method: HttpMethod;
  /** Whether the resource path is followed by `/:id` */
  member: boolean;
  /** Literal segment appended last, e.g. `new` or `edit` */
  suffix?: string;
}

export const ACTION_ROUTE_RULES: Readonly<Record<ActionKind, ActionRouteRule>> = {
  Index: { method: "GET", member: false },
  Show: { method: "GET", member: true },
  New: { method: "GET", member: false, suffix: "new" },
  Create: { method: "POST", member: false },
  Edit: { method: "GET", member: true, suffix: "edit" },
  Update: { method: "PUT", member: true },
  Delete: { method: "DELETE", member: true },
};

export const ACTION_KINDS: readonly ActionKind[] = [
  "Index",
  "Show",
  "New",
  "Create",
  "Edit",
  "Update",
  "Delete",
];

export const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "DELETE",
];

export function isActionKind(value: string): value is ActionKind {
  return (ACTION_KINDS as readonly string[]).includes(value);
}

export function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}
