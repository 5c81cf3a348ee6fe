/**
 * Convention resolver - maps an action name to its HTTP method and path template.
 *
 * | Action | Method | Path                      |
 * |--------|--------|---------------------------|
 * | Index  | GET    | /<ns…>/<r>                |
 * | Show   | GET    | /<ns…>/<r>/:id            |
 * | New    | GET    | /<ns…>/<r>/new            |
 * | Create | POST   | /<ns…>/<r>                |
 * | Edit   | GET    | /<ns…>/<r>/:id/edit       |
 * | Update | PUT    | /<ns…>/<r>/:id            |
 * | Delete | DELETE | /<ns…>/<r>/:id            |
 *
 * In nested mode the segment before `<r>` is the parent resource and is
 * followed by `:<singular parent>_id`.
 */

import type {
  ResolveMode,
  RouteName,
  RoutePattern,
} from "@route-conventions/types";
import { InvalidRouteNameError } from "../errors";
import { ACTION_ROUTE_RULES } from "./action-kind";
import { singularize, underscore } from "./inflector";
import { formatRouteName, toRouteName } from "./route-name";

/**
 * Resolve a route name to its pattern. Pure: equal inputs give equal outputs.
 */
export function resolveRoute(
  name: RouteName | string,
  mode: ResolveMode = "plain",
): RoutePattern {
  const parsed = toRouteName(name);
  const rule = ACTION_ROUTE_RULES[parsed.action];
  const literals = parsed.segments.map(underscore);

  const path: string[] = [];
  const params: string[] = [];

  if (mode === "nested") {
    if (literals.length < 2) {
      throw new InvalidRouteNameError(
        formatRouteName(parsed),
        "a nested route needs a parent segment before the resource",
      );
    }
    const parent = literals[literals.length - 2];
    const parentParam = `${singularize(parent)}_id`;
    path.push(...literals.slice(0, -1), `:${parentParam}`);
    params.push(parentParam);
    path.push(literals[literals.length - 1]);
  } else {
    path.push(...literals);
  }

  if (rule.member) {
    path.push(":id");
    params.push("id");
  }
  if (rule.suffix) {
    path.push(rule.suffix);
  }

  return {
    method: rule.method,
    path: "/" + path.join("/"),
    params,
  };
}
