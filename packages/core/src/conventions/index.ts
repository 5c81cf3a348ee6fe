/**
 * Conventions module - action names to route patterns
 */

export {
  ACTION_KINDS,
  ACTION_ROUTE_RULES,
  HTTP_METHODS,
  isActionKind,
  isHttpMethod,
  type ActionRouteRule,
} from "./action-kind";
export { camelize, singularize, underscore } from "./inflector";
export {
  ROUTE_NAME_SEPARATOR,
  formatRouteName,
  parseRouteName,
  routeName,
  toRouteName,
} from "./route-name";
export { resolveRoute } from "./resolver";
