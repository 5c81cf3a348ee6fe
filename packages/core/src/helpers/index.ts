/**
 * Helpers module - path, route and redirect builders
 */

export {
  defineAction,
  patternFor,
  type ActionHelpers,
  type DefineActionOptions,
} from "./action-helpers";
export {
  buildPath,
  buildQueryString,
  joinUrl,
  paramNames,
  type ParamNames,
  type PathParams,
} from "./path-builder";
export { redirectTo } from "./redirect";
