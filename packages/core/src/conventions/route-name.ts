/**
 * Parsing and formatting of namespace-qualified action names
 */

import type { RouteName } from "@route-conventions/types";
import { InvalidRouteNameError, UnrecognizedActionKindError } from "../errors";
import { isActionKind } from "./action-kind";

export const ROUTE_NAME_SEPARATOR = "::";

const SEGMENT_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Parse `Api::V1::Users::Show` (or `Api.V1.Users.Show`) into a RouteName.
 */
export function parseRouteName(text: string): RouteName {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new InvalidRouteNameError(text, "name is empty");
  }

  const parts = trimmed.includes(ROUTE_NAME_SEPARATOR)
    ? trimmed.split(ROUTE_NAME_SEPARATOR)
    : trimmed.split(".");

  const action = parts[parts.length - 1];
  if (!action) {
    throw new InvalidRouteNameError(text, "name must end with an action");
  }
  return routeName(parts.slice(0, -1), action, trimmed);
}

/**
 * Build a RouteName from its parts, validating every segment and the tag.
 */
export function routeName(
  segments: readonly string[],
  action: string,
  displayName: string = [...segments, action].join(ROUTE_NAME_SEPARATOR),
): RouteName {
  if (segments.length === 0) {
    throw new InvalidRouteNameError(
      displayName,
      "at least one resource segment must precede the action",
    );
  }
  for (const segment of segments) {
    if (!SEGMENT_PATTERN.test(segment)) {
      throw new InvalidRouteNameError(
        displayName,
        segment
          ? `"${segment}" is not a valid segment`
          : "segments must not be empty",
      );
    }
  }
  if (!isActionKind(action)) {
    throw new UnrecognizedActionKindError(action, displayName);
  }

  const name: RouteName = {
    segments: Object.freeze([...segments]),
    action,
  };
  return Object.freeze(name);
}

export function formatRouteName(name: RouteName): string {
  return [...name.segments, name.action].join(ROUTE_NAME_SEPARATOR);
}

/**
 * Accept either text or a name object. Objects are validated again, since
 * they may come from untyped callers.
 */
export function toRouteName(name: RouteName | string): RouteName {
  return typeof name === "string"
    ? parseRouteName(name)
    : routeName(name.segments, name.action);
}
